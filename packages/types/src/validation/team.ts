/**
 * Team Validation Schemas
 *
 * Zod schemas for team records and team service inputs.
 */

import { z } from 'zod';
import type {
  TeamMemberRecord,
  TeamPermission,
  TeamRecord,
  TeamRole,
} from '../domain/team.js';
import {
  entityIdSchema,
  isoTimestampSchema,
  searchQuerySchema,
} from './shared.js';

/** Team role schema */
export const teamRoleSchema: z.ZodType<TeamRole> = z.enum([
  'leader',
  'member',
  'contributor',
]);

/** Team permission schema */
export const teamPermissionSchema: z.ZodType<TeamPermission> = z.enum([
  'team.manage',
  'project.create',
  'project.assign',
  'project.view',
  'member.add',
  'member.remove',
  'member.promote',
  'task.create',
  'task.assign',
  'task.view',
  'comment.add',
  'milestone.view',
]);

/** Team name schema (trimmed, non-empty) */
export const teamNameSchema = z
  .string()
  .trim()
  .min(1, 'Team name cannot be empty');

/** Serialized team member schema */
export const teamMemberRecordSchema: z.ZodType<TeamMemberRecord> = z.object({
  userId: entityIdSchema,
  role: teamRoleSchema,
  joinedAt: isoTimestampSchema,
  permissions: z.array(teamPermissionSchema),
});

/** Serialized team schema */
export const teamRecordSchema: z.ZodType<TeamRecord> = z.object({
  id: entityIdSchema,
  name: z.string().min(1),
  description: z.string(),
  leaderId: entityIdSchema.nullable(),
  members: z.array(teamMemberRecordSchema),
  projectIds: z.array(entityIdSchema),
  createdAt: isoTimestampSchema,
  updatedAt: isoTimestampSchema,
});

/** Create team request schema */
export const createTeamSchema = z.object({
  name: teamNameSchema,
  description: z.string().optional(),
  leaderId: entityIdSchema.optional(),
});

/** Team search filter schema */
export const teamSearchSchema = z.object({
  query: searchQuerySchema.optional(),
  leaderId: entityIdSchema.optional(),
});

/** Export types from schemas */
export type CreateTeamInput = z.infer<typeof createTeamSchema>;
export type TeamSearchFilter = z.infer<typeof teamSearchSchema>;
