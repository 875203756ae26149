import { describe, it, expect } from 'vitest';
import {
  TASK_PRIORITIES,
  TASK_STATUSES,
  createTaskSchema,
  taskPrioritySchema,
  taskSearchSchema,
  taskStatusSchema,
  updateTaskDetailsSchema,
} from '@worklane/types';

describe('task schemas', () => {
  describe('taskStatusSchema', () => {
    it('should accept the lower-case tokens only', () => {
      for (const status of TASK_STATUSES) {
        expect(taskStatusSchema.safeParse(status).success).toBe(true);
      }
      expect(taskStatusSchema.safeParse('in_progress').success).toBe(true);
      expect(taskStatusSchema.safeParse('IN_PROGRESS').success).toBe(false);
      expect(taskStatusSchema.safeParse('blocked').success).toBe(false);
    });
  });

  describe('taskPrioritySchema', () => {
    it('should accept every priority', () => {
      for (const priority of TASK_PRIORITIES) {
        expect(taskPrioritySchema.safeParse(priority).success).toBe(true);
      }
      expect(taskPrioritySchema.safeParse('critical').success).toBe(false);
    });
  });

  describe('createTaskSchema', () => {
    it('should trim the title and keep optional fields', () => {
      const dueDate = new Date('2024-03-01T12:00:00.000Z');

      const result = createTaskSchema.parse({
        title: '  Write docs ',
        priority: 'high',
        dueDate,
        tags: ['docs'],
      });

      expect(result).toEqual({
        title: 'Write docs',
        priority: 'high',
        dueDate,
        tags: ['docs'],
      });
    });

    it('should reject a blank title with its message', () => {
      const result = createTaskSchema.safeParse({ title: '   ' });

      expect(result.success).toBe(false);
      expect(result.error?.issues[0]).toMatchObject({
        path: ['title'],
        message: 'Task title cannot be empty',
      });
    });

    it('should reject a due date given as a string', () => {
      expect(
        createTaskSchema.safeParse({
          title: 'Write docs',
          dueDate: '2024-03-01T12:00:00.000Z',
        }).success,
      ).toBe(false);
    });
  });

  describe('updateTaskDetailsSchema', () => {
    it('should accept null to clear the due date', () => {
      expect(updateTaskDetailsSchema.parse({ dueDate: null })).toEqual({
        dueDate: null,
      });
    });

    it('should reject fields that are not task details', () => {
      expect(updateTaskDetailsSchema.safeParse({ status: 'done' }).success).toBe(
        false,
      );
    });
  });

  describe('taskSearchSchema', () => {
    it('should normalize the tag filter', () => {
      expect(taskSearchSchema.parse({ tag: ' Docs ' })).toEqual({ tag: 'docs' });
    });
  });
});
