/**
 * Task Validation Schemas
 *
 * Zod schemas for task records and task service inputs.
 */

import { z } from 'zod';
import type {
  TaskCommentRecord,
  TaskPriority,
  TaskRecord,
  TaskStatus,
} from '../domain/task.js';
import {
  entityIdSchema,
  isoTimestampSchema,
  searchQuerySchema,
} from './shared.js';

/** Task status schema */
export const taskStatusSchema: z.ZodType<TaskStatus> = z.enum([
  'todo',
  'in_progress',
  'review',
  'done',
  'cancelled',
]);

/** Task priority schema */
export const taskPrioritySchema: z.ZodType<TaskPriority> = z.enum([
  'low',
  'medium',
  'high',
  'urgent',
]);

/** Task title schema (trimmed, non-empty) */
export const taskTitleSchema = z
  .string()
  .trim()
  .min(1, 'Task title cannot be empty');

/** Comment body schema (trimmed, non-empty) */
export const commentContentSchema = z
  .string()
  .trim()
  .min(1, 'Comment content cannot be empty');

/** Tag schema (trimmed, lower-cased; may be empty) */
export const tagSchema = z.string().trim().toLowerCase();

/** Serialized comment schema */
export const taskCommentRecordSchema: z.ZodType<TaskCommentRecord> = z.object({
  id: entityIdSchema,
  authorId: entityIdSchema,
  content: z.string().min(1),
  createdAt: isoTimestampSchema,
});

/** Serialized task schema */
export const taskRecordSchema: z.ZodType<TaskRecord> = z.object({
  id: entityIdSchema,
  title: z.string().min(1),
  description: z.string(),
  status: taskStatusSchema,
  priority: taskPrioritySchema,
  assigneeId: entityIdSchema.nullable(),
  dueDate: isoTimestampSchema.nullable(),
  comments: z.array(taskCommentRecordSchema),
  tags: z.array(z.string()),
  createdAt: isoTimestampSchema,
  updatedAt: isoTimestampSchema,
});

/** Create task request schema */
export const createTaskSchema = z.object({
  title: taskTitleSchema,
  description: z.string().optional(),
  assigneeId: entityIdSchema.optional(),
  priority: taskPrioritySchema.optional(),
  dueDate: z.date().optional(),
  tags: z.array(z.string()).optional(),
});

/** Update task details request schema */
export const updateTaskDetailsSchema = z
  .object({
    title: taskTitleSchema.optional(),
    description: z.string().optional(),
    priority: taskPrioritySchema.optional(),
    dueDate: z.date().nullable().optional(),
  })
  .strict();

/** Task search filter schema */
export const taskSearchSchema = z.object({
  query: searchQuerySchema.optional(),
  status: taskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  assigneeId: entityIdSchema.optional(),
  tag: tagSchema.optional(),
});

/** Export types from schemas */
export type CreateTaskInput = z.infer<typeof createTaskSchema>;
export type UpdateTaskDetailsInput = z.infer<typeof updateTaskDetailsSchema>;
export type TaskSearchFilter = z.infer<typeof taskSearchSchema>;
