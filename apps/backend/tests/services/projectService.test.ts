import { describe, it, expect, beforeEach } from 'vitest';
import type { ProjectSearchFilter } from '@worklane/types';
import type { Project } from '../../src/models/index.ts';
import {
  NotFoundError,
  PermissionDeniedError,
} from '../../src/types/errors.ts';
import {
  captureError,
  createTestLogger,
  createTestWorkspace,
  type TestWorkspace,
} from '../fixtures/index.ts';

const HOUR_MS = 60 * 60 * 1000;
const NOW = new Date('2024-03-01T12:00:00.000Z');

describe('ProjectService', () => {
  let workspace: TestWorkspace;
  let adminId: string;
  let bobId: string;
  let daveId: string;

  beforeEach(() => {
    workspace = createTestWorkspace();
    adminId = workspace.addUser('admin');
    bobId = workspace.addUser('standard');
    daveId = workspace.addUser('other');
  });

  function createBobsProject(name = 'Launch'): Project {
    return workspace.services.projects.createProject({
      name,
      ownerId: bobId,
    });
  }

  function createTaskId(title: string): string {
    return workspace.services.tasks.createTask({ title }).id;
  }

  describe('createProject', () => {
    it('should save a planning project', () => {
      const project = createBobsProject();

      const stored = workspace.services.projects.getProject(project.id);
      expect(stored?.status).toBe('planning');
      expect(stored?.ownerId).toBe(bobId);
    });

    it('should reject an unknown owner', () => {
      expect(() =>
        workspace.services.projects.createProject({
          name: 'Launch',
          ownerId: 'missing',
        }),
      ).toThrow('Owner with ID missing not found');
      expect(workspace.repositories.projects.count()).toBe(0);
    });

    it('should return null for an unknown project', () => {
      expect(workspace.services.projects.getProject('missing')).toBeNull();
    });
  });

  describe('authorization', () => {
    it('should let the owner and admins change the status', () => {
      const project = createBobsProject();

      workspace.services.projects.updateProjectStatus(
        project.id,
        'active',
        bobId,
      );
      workspace.services.projects.updateProjectStatus(
        project.id,
        'on_hold',
        adminId,
      );

      expect(workspace.services.projects.getProject(project.id)?.status).toBe(
        'on_hold',
      );
    });

    it('should refuse outsiders', () => {
      const project = createBobsProject();

      const error = captureError(() =>
        workspace.services.projects.updateProjectStatus(
          project.id,
          'active',
          daveId,
        ),
      );

      expect(error).toBeInstanceOf(PermissionDeniedError);
      expect(error).toMatchObject({
        message: `User ${daveId} does not have permission to modify project ${project.id}`,
      });
    });

    it('should admit roster members once they are added', () => {
      const project = createBobsProject();

      workspace.services.projects.addTeamMember(project.id, daveId, bobId);
      workspace.services.projects.updateProjectStatus(
        project.id,
        'active',
        daveId,
      );

      expect(workspace.services.projects.getProject(project.id)?.status).toBe(
        'active',
      );
    });

    it('should shut roster members out again after removal', () => {
      const project = createBobsProject();
      workspace.services.projects.addTeamMember(project.id, daveId, bobId);

      workspace.services.projects.removeTeamMember(project.id, daveId, bobId);

      expect(() =>
        workspace.services.projects.updateProjectStatus(
          project.id,
          'active',
          daveId,
        ),
      ).toThrow(PermissionDeniedError);
    });

    it('should reject an unknown roster user', () => {
      const project = createBobsProject();

      expect(() =>
        workspace.services.projects.addTeamMember(project.id, 'missing', bobId),
      ).toThrow('User with ID missing not found');
    });

    it('should report a missing roster user before refusing an outsider', () => {
      const project = createBobsProject();

      const error = captureError(() =>
        workspace.services.projects.addTeamMember(project.id, 'missing', daveId),
      );

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ message: 'User with ID missing not found' });
    });

    it('should report a missing task before refusing an outsider', () => {
      const project = createBobsProject();

      const error = captureError(() =>
        workspace.services.projects.addTaskToProject(
          project.id,
          'missing',
          daveId,
        ),
      );

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ message: 'Task with ID missing not found' });
      expect(workspace.services.projects.getProject(project.id)?.taskIds).toEqual(
        [],
      );
    });
  });

  describe('tasks', () => {
    it('should reference existing tasks once', () => {
      const { logger, getLogsByLevel } = createTestLogger();
      const project = createBobsProject();
      const taskId = createTaskId('Write docs');

      workspace.services.projects.addTaskToProject(project.id, taskId, bobId);
      workspace.services.projects.addTaskToProject(
        project.id,
        taskId,
        bobId,
        logger,
      );

      expect(
        workspace.services.projects.getProject(project.id)?.taskIds,
      ).toEqual([taskId]);
      expect(getLogsByLevel('debug')).toMatchObject([
        { msg: 'No change', action: 'addTaskToProject', taskId },
      ]);
    });

    it('should reject an unknown task', () => {
      const project = createBobsProject();

      expect(() =>
        workspace.services.projects.addTaskToProject(
          project.id,
          'missing',
          bobId,
        ),
      ).toThrow('Task with ID missing not found');
    });

    it('should remove task references', () => {
      const project = createBobsProject();
      const taskId = createTaskId('Write docs');
      workspace.services.projects.addTaskToProject(project.id, taskId, bobId);

      workspace.services.projects.removeTaskFromProject(
        project.id,
        taskId,
        bobId,
      );

      expect(
        workspace.services.projects.getProject(project.id)?.taskIds,
      ).toEqual([]);
    });

    it('should resolve tasks in order and skip dangling references', () => {
      const project = createBobsProject();
      const first = createTaskId('First');
      const gone = createTaskId('Gone');
      const last = createTaskId('Last');
      for (const taskId of [first, gone, last]) {
        workspace.services.projects.addTaskToProject(project.id, taskId, bobId);
      }
      workspace.services.tasks.updateTaskStatus(last, 'review');
      workspace.repositories.tasks.delete(gone);

      const tasks = workspace.services.projects.getProjectTasks(project.id);

      expect(tasks.map((task) => task.title)).toEqual(['First', 'Last']);
      expect(
        workspace.services.projects
          .getProjectTasks(project.id, 'review')
          .map((task) => task.id),
      ).toEqual([last]);
    });
  });

  describe('milestones', () => {
    it('should add and complete milestones', () => {
      const project = createBobsProject();
      const due = new Date(NOW.getTime() + 72 * HOUR_MS);

      const milestone = workspace.services.projects.addMilestone(
        project.id,
        { title: 'Beta', dueDate: due },
        bobId,
      );

      expect(milestone).toMatchObject({
        title: 'Beta',
        description: '',
        dueDate: due,
        completed: false,
      });
      expect(
        workspace.services.projects.completeMilestone(
          project.id,
          milestone.id,
          bobId,
        ),
      ).toBe(true);
      expect(
        workspace.services.projects.getProject(project.id)?.milestones[0]
          ?.completed,
      ).toBe(true);
    });

    it('should return false for an unknown milestone', () => {
      const project = createBobsProject();

      expect(
        workspace.services.projects.completeMilestone(
          project.id,
          'missing',
          bobId,
        ),
      ).toBe(false);
    });

    it('should reject a blank milestone title', () => {
      const project = createBobsProject();

      expect(() =>
        workspace.services.projects.addMilestone(
          project.id,
          { title: ' ', dueDate: NOW },
          bobId,
        ),
      ).toThrow('title: Milestone title cannot be empty');
    });
  });

  describe('getProjectProgress', () => {
    it('should combine task, milestone and roster figures', () => {
      const project = createBobsProject();
      const done = createTaskId('Done');
      const late = workspace.services.tasks.createTask({
        title: 'Late',
        dueDate: new Date(NOW.getTime() - 2 * HOUR_MS),
      }).id;
      const fire = workspace.services.tasks.createTask({
        title: 'Fire',
        priority: 'urgent',
      }).id;
      for (const taskId of [done, late, fire]) {
        workspace.services.projects.addTaskToProject(project.id, taskId, bobId);
      }
      workspace.services.tasks.updateTaskStatus(done, 'done');
      const beta = workspace.services.projects.addMilestone(
        project.id,
        { title: 'Beta', dueDate: NOW },
        bobId,
      );
      workspace.services.projects.addMilestone(
        project.id,
        { title: 'GA', dueDate: NOW },
        bobId,
      );
      workspace.services.projects.completeMilestone(project.id, beta.id, bobId);
      workspace.services.projects.addTeamMember(project.id, daveId, bobId);

      const progress = workspace.services.projects.getProjectProgress(
        project.id,
        NOW,
      );

      expect(progress).toEqual({
        projectId: project.id,
        name: 'Launch',
        status: 'planning',
        progressPercentage: 33,
        taskStatistics: {
          total: 3,
          todo: 2,
          in_progress: 0,
          review: 0,
          done: 1,
          cancelled: 0,
          overdue: 1,
          urgent: 1,
        },
        overdueTasks: 1,
        urgentTasks: 1,
        milestones: { total: 2, completed: 1, pending: 1 },
        teamSize: 1,
      });
    });

    it('should report zero progress for an empty project', () => {
      const project = createBobsProject();

      expect(
        workspace.services.projects.getProjectProgress(project.id, NOW),
      ).toMatchObject({ progressPercentage: 0, teamSize: 0 });
    });
  });

  describe('queries', () => {
    it('should list owned and joined projects', () => {
      createBobsProject('Owned');
      const joined = workspace.services.projects.createProject({
        name: 'Joined',
        ownerId: adminId,
      });
      workspace.services.projects.createProject({ name: 'Unrelated' });
      workspace.services.projects.addTeamMember(joined.id, bobId, adminId);
      workspace.services.projects.updateProjectStatus(
        joined.id,
        'active',
        adminId,
      );

      const names = (status?: 'active') =>
        workspace.services.projects
          .getUserProjects(bobId, status)
          .map((project) => project.name);

      expect(names()).toEqual(['Owned', 'Joined']);
      expect(names('active')).toEqual(['Joined']);
    });

    it('should require the user to exist', () => {
      expect(() =>
        workspace.services.projects.getUserProjects('missing'),
      ).toThrow('User with ID missing not found');
    });

    it('should search names and descriptions with filters', () => {
      workspace.services.projects.createProject({
        name: 'Mobile app',
        description: 'iOS and Android',
        ownerId: bobId,
      });
      workspace.services.projects.createProject({
        name: 'Website',
        description: 'Marketing site',
        ownerId: daveId,
      });

      const search = (filter: ProjectSearchFilter) =>
        workspace.services.projects
          .searchProjects(filter)
          .map((project) => project.name);

      expect(search({ query: 'android' })).toEqual(['Mobile app']);
      expect(search({ query: 'SITE' })).toEqual(['Website']);
      expect(search({ ownerId: daveId })).toEqual(['Website']);
      expect(search({ status: 'active' })).toEqual([]);
    });

    it("should aggregate statistics over all projects or one user's", () => {
      const project = createBobsProject();
      const late = workspace.services.tasks.createTask({
        title: 'Late',
        dueDate: new Date(NOW.getTime() - HOUR_MS),
      }).id;
      const gone = createTaskId('Gone');
      workspace.services.projects.addTaskToProject(project.id, late, bobId);
      workspace.services.projects.addTaskToProject(project.id, gone, bobId);
      workspace.repositories.tasks.delete(gone);
      workspace.services.projects.addMilestone(
        project.id,
        { title: 'Beta', dueDate: NOW },
        bobId,
      );
      workspace.services.projects.createProject({
        name: 'Other',
        ownerId: daveId,
      });

      expect(
        workspace.services.projects.getProjectStatistics(undefined, NOW),
      ).toEqual({
        total: 2,
        byStatus: {
          planning: 2,
          active: 0,
          on_hold: 0,
          completed: 0,
          cancelled: 0,
        },
        totalTasks: 2,
        totalMilestones: 1,
        overdueProjects: 1,
      });
      expect(
        workspace.services.projects.getProjectStatistics(daveId, NOW),
      ).toMatchObject({ total: 1, totalTasks: 0, overdueProjects: 0 });
    });
  });
});
