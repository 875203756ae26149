import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Project, Task } from '../../src/models/index.ts';
import { ValidationError } from '../../src/types/errors.ts';

const NOW = new Date('2024-03-01T12:00:00.000Z');
const DAY_MS = 24 * 60 * 60 * 1000;

function createTasks(count: number): Task[] {
  return Array.from({ length: count }, (_, i) =>
    Task.create({ title: `Task ${i + 1}` }),
  );
}

function projectWith(tasks: ReadonlyArray<Task>): Project {
  const project = Project.create({ name: 'Launch' });
  for (const task of tasks) {
    project.addTask(task.id);
  }
  return project;
}

describe('Project', () => {
  describe('create', () => {
    it('should start in planning with empty collections', () => {
      const project = Project.create({ name: '  Launch  ', ownerId: 'user-1' });

      expect(project.name).toBe('Launch');
      expect(project.status).toBe('planning');
      expect(project.ownerId).toBe('user-1');
      expect(project.taskIds).toEqual([]);
      expect(project.milestones).toEqual([]);
      expect(project.teamMembers).toEqual([]);
    });

    it('should reject a blank name', () => {
      expect(() => Project.create({ name: ' ' })).toThrow(
        'Project name cannot be empty',
      );
    });
  });

  describe('tasks', () => {
    it('should add a task reference once', () => {
      const project = Project.create({ name: 'Launch' });

      expect(project.addTask('task-1')).toBe(true);
      expect(project.addTask('task-1')).toBe(false);
      expect(project.taskIds).toEqual(['task-1']);
      expect(project.hasTask('task-1')).toBe(true);
    });

    it('should report whether a removed task was present', () => {
      const project = Project.create({ name: 'Launch' });
      project.addTask('task-1');

      expect(project.removeTask('task-1')).toBe(true);
      expect(project.removeTask('task-1')).toBe(false);
      expect(project.taskIds).toEqual([]);
    });

    it('should ignore tasks it does not reference', () => {
      const [own, foreign] = createTasks(2);
      if (!own || !foreign) throw new Error('fixture');
      const project = projectWith([own]);

      expect(project.selectOwnTasks([foreign, own])).toEqual([own]);
    });

    it('should filter its tasks by status', () => {
      const tasks = createTasks(3);
      tasks[1]?.updateStatus('review');
      const project = projectWith(tasks);

      expect(project.getTasksByStatus(tasks, 'review')).toEqual([tasks[1]]);
      expect(project.getTasksByStatus(tasks, 'todo')).toHaveLength(2);
    });
  });

  describe('getProgressPercentage', () => {
    it('should be 0 without tasks', () => {
      expect(Project.create({ name: 'Launch' }).getProgressPercentage([])).toBe(
        0,
      );
    });

    it('should floor the done ratio (1 of 3 is 33)', () => {
      const tasks = createTasks(3);
      tasks[0]?.updateStatus('done');
      const project = projectWith(tasks);

      expect(project.getProgressPercentage(tasks)).toBe(33);
    });

    it('should floor 2 of 3 to 66', () => {
      const tasks = createTasks(3);
      tasks[0]?.updateStatus('done');
      tasks[2]?.updateStatus('done');

      expect(projectWith(tasks).getProgressPercentage(tasks)).toBe(66);
    });

    it('should be 100 when every task is done', () => {
      const tasks = createTasks(2);
      tasks.forEach((task) => task.updateStatus('done'));

      expect(projectWith(tasks).getProgressPercentage(tasks)).toBe(100);
    });

    it('should count only done tasks, not review or cancelled', () => {
      const tasks = createTasks(4);
      tasks[0]?.updateStatus('done');
      tasks[1]?.updateStatus('review');
      tasks[2]?.updateStatus('cancelled');

      expect(projectWith(tasks).getProgressPercentage(tasks)).toBe(25);
    });
  });

  describe('task statistics', () => {
    it('should count statuses, overdue and urgent tasks', () => {
      const late = Task.create({
        title: 'Late',
        dueDate: new Date(NOW.getTime() - DAY_MS),
      });
      const urgent = Task.create({ title: 'Fire', priority: 'urgent' });
      const done = Task.create({ title: 'Done' });
      done.updateStatus('done');
      const project = projectWith([late, urgent, done]);
      const tasks = [late, urgent, done];

      expect(project.getOverdueTasks(tasks, NOW)).toEqual([late]);
      expect(project.getUrgentTasks(tasks, NOW)).toEqual([urgent]);
      expect(project.getTaskStatistics(tasks, NOW)).toEqual({
        total: 3,
        todo: 2,
        in_progress: 0,
        review: 0,
        done: 1,
        cancelled: 0,
        overdue: 1,
        urgent: 1,
      });
    });
  });

  describe('milestones', () => {
    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(NOW);
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should add a pending milestone', () => {
      const project = Project.create({ name: 'Launch' });
      const due = new Date(NOW.getTime() + 7 * DAY_MS);

      const milestone = project.addMilestone(' Beta ', ' First cut ', due);

      expect(milestone).toMatchObject({
        title: 'Beta',
        description: 'First cut',
        dueDate: due,
        completed: false,
        completedAt: null,
      });
      expect(project.milestones).toHaveLength(1);
    });

    it('should reject a blank milestone title', () => {
      const project = Project.create({ name: 'Launch' });

      expect(() => project.addMilestone('  ', '', NOW)).toThrow(
        ValidationError,
      );
      expect(project.milestones).toEqual([]);
    });

    it('should set completedAt when completing a milestone', () => {
      const project = Project.create({ name: 'Launch' });
      const milestone = project.addMilestone('Beta', '', NOW);
      vi.setSystemTime(new Date(NOW.getTime() + DAY_MS));

      expect(project.completeMilestone(milestone.id)).toBe(true);

      const [completed] = project.milestones;
      expect(completed?.completed).toBe(true);
      expect(completed?.completedAt).toEqual(new Date(NOW.getTime() + DAY_MS));
      expect(project.updatedAt).toEqual(new Date(NOW.getTime() + DAY_MS));
    });

    it('should return false for an unknown milestone', () => {
      const project = Project.create({ name: 'Launch' });
      vi.setSystemTime(new Date(NOW.getTime() + DAY_MS));

      expect(project.completeMilestone('missing')).toBe(false);
      expect(project.updatedAt).toEqual(NOW);
    });
  });

  describe('team members', () => {
    it('should add and remove roster entries idempotently', () => {
      const project = Project.create({ name: 'Launch' });

      expect(project.addTeamMember('user-1')).toBe(true);
      expect(project.addTeamMember('user-1')).toBe(false);
      expect(project.isTeamMember('user-1')).toBe(true);
      expect(project.removeTeamMember('user-1')).toBe(true);
      expect(project.removeTeamMember('user-1')).toBe(false);
      expect(project.teamMembers).toEqual([]);
    });
  });

  describe('status', () => {
    it('should transition freely', () => {
      const project = Project.create({ name: 'Launch' });

      project.updateStatus('completed');
      project.updateStatus('active');
      project.updateStatus('on_hold');

      expect(project.status).toBe('on_hold');
    });
  });

  describe('serialization', () => {
    it('should round-trip every field through a plain record', () => {
      const project = Project.create({
        name: 'Launch',
        description: 'Q2 launch',
        ownerId: 'user-1',
      });
      project.addTask('task-1');
      project.addTask('task-2');
      project.addTeamMember('user-2');
      const milestone = project.addMilestone('Beta', 'First cut', NOW);
      project.addMilestone('GA', '', new Date(NOW.getTime() + DAY_MS));
      project.completeMilestone(milestone.id);
      project.updateStatus('active');

      const record = JSON.parse(JSON.stringify(project.toRecord()));
      const restored = Project.fromRecord(record);

      expect(restored.toRecord()).toEqual(project.toRecord());
      expect(restored.status).toBe('active');
      expect(restored.taskIds).toEqual(['task-1', 'task-2']);
    });

    it('should reject an unknown status token', () => {
      const record = Project.create({ name: 'Launch' }).toRecord();

      expect(() => Project.fromRecord({ ...record, status: 'paused' })).toThrow(
        ValidationError,
      );
    });
  });
});
