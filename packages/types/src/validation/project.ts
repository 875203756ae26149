/**
 * Project Validation Schemas
 *
 * Zod schemas for project records and project service inputs.
 */

import { z } from 'zod';
import type {
  MilestoneRecord,
  ProjectRecord,
  ProjectStatus,
} from '../domain/project.js';
import {
  entityIdSchema,
  isoTimestampSchema,
  searchQuerySchema,
} from './shared.js';

/** Project status schema */
export const projectStatusSchema: z.ZodType<ProjectStatus> = z.enum([
  'planning',
  'active',
  'on_hold',
  'completed',
  'cancelled',
]);

/** Project name schema (trimmed, non-empty) */
export const projectNameSchema = z
  .string()
  .trim()
  .min(1, 'Project name cannot be empty');

/** Milestone title schema (trimmed, non-empty) */
export const milestoneTitleSchema = z
  .string()
  .trim()
  .min(1, 'Milestone title cannot be empty');

/** Serialized milestone schema */
export const milestoneRecordSchema: z.ZodType<MilestoneRecord> = z.object({
  id: entityIdSchema,
  title: z.string().min(1),
  description: z.string(),
  dueDate: isoTimestampSchema,
  completed: z.boolean(),
  completedAt: isoTimestampSchema.nullable(),
});

/** Serialized project schema */
export const projectRecordSchema: z.ZodType<ProjectRecord> = z.object({
  id: entityIdSchema,
  name: z.string().min(1),
  description: z.string(),
  status: projectStatusSchema,
  ownerId: entityIdSchema.nullable(),
  taskIds: z.array(entityIdSchema),
  milestones: z.array(milestoneRecordSchema),
  teamMembers: z.array(entityIdSchema),
  createdAt: isoTimestampSchema,
  updatedAt: isoTimestampSchema,
});

/** Create project request schema */
export const createProjectSchema = z.object({
  name: projectNameSchema,
  description: z.string().optional(),
  ownerId: entityIdSchema.optional(),
});

/** Add milestone request schema */
export const addMilestoneSchema = z.object({
  title: milestoneTitleSchema,
  description: z.string().optional(),
  dueDate: z.date(),
});

/** Project search filter schema */
export const projectSearchSchema = z.object({
  query: searchQuerySchema.optional(),
  status: projectStatusSchema.optional(),
  ownerId: entityIdSchema.optional(),
});

/** Export types from schemas */
export type CreateProjectInput = z.infer<typeof createProjectSchema>;
export type AddMilestoneInput = z.infer<typeof addMilestoneSchema>;
export type ProjectSearchFilter = z.infer<typeof projectSearchSchema>;
