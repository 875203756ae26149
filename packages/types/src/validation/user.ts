/**
 * User Validation Schemas
 *
 * Zod schemas for user records and user service inputs.
 */

import { z } from 'zod';
import type {
  UserPermission,
  UserProfile,
  UserRecord,
  UserRole,
} from '../domain/user.js';
import { entityIdSchema, isoTimestampSchema, searchQuerySchema } from './shared.js';

/** Username schema (trimmed, lower-cased) */
export const usernameSchema = z
  .string()
  .trim()
  .min(3, 'Username must be at least 3 characters')
  .max(30, 'Username must be 30 characters or less')
  .regex(
    /^[a-zA-Z0-9_]+$/,
    'Username can only contain letters, numbers, and underscores',
  )
  .toLowerCase();

/** Email schema (trimmed, lower-cased) */
export const emailSchema = z
  .string()
  .trim()
  .min(1, 'Email is required')
  .email('Invalid email format')
  .toLowerCase();

/** Password schema */
export const passwordSchema = z
  .string()
  .min(6, 'Password must be at least 6 characters')
  .max(128, 'Password must be 128 characters or less');

/** User role schema */
export const userRoleSchema: z.ZodType<UserRole> = z.enum([
  'admin',
  'standard',
  'guest',
]);

/** User permission schema */
export const userPermissionSchema: z.ZodType<UserPermission> = z.enum([
  'admin.panel',
  'user.manage',
  'system.settings',
  'profile.update',
  'content.create',
  'content.read',
]);

/** Profile schema */
export const userProfileSchema: z.ZodType<UserProfile> = z.object({
  firstName: z.string(),
  lastName: z.string(),
  bio: z.string(),
});

/** Partial profile update; unknown fields are rejected */
export const updateProfileSchema = z
  .object({
    firstName: z.string({ invalid_type_error: 'firstName must be a string' }),
    lastName: z.string({ invalid_type_error: 'lastName must be a string' }),
    bio: z.string({ invalid_type_error: 'bio must be a string' }),
  })
  .partial()
  .strict();

/** Stored credential schema (`<iterations>:<saltHex>:<digestHex>`) */
export const passwordHashSchema = z
  .string()
  .regex(/^[1-9][0-9]*:[0-9a-f]+:[0-9a-f]+$/, 'Malformed password hash');

/** Serialized user schema */
export const userRecordSchema: z.ZodType<UserRecord> = z.object({
  id: entityIdSchema.nullable(),
  username: z.string().min(3),
  email: z.string().min(1),
  passwordHash: passwordHashSchema,
  role: userRoleSchema,
  profile: userProfileSchema,
  permissions: z.array(userPermissionSchema),
  createdAt: isoTimestampSchema,
  updatedAt: isoTimestampSchema,
});

/** Create user request schema */
export const createUserSchema = z.object({
  username: usernameSchema,
  email: emailSchema,
  password: passwordSchema,
  role: userRoleSchema.optional(),
  profile: updateProfileSchema.optional(),
});

/** Change password request schema */
export const changePasswordSchema = z.object({
  currentPassword: z.string().min(1, 'Current password is required'),
  newPassword: passwordSchema,
});

/** User search filter schema */
export const userSearchSchema = z.object({
  query: searchQuerySchema.optional(),
  role: userRoleSchema.optional(),
});

/** Export types from schemas */
export type CreateUserInput = z.infer<typeof createUserSchema>;
export type UpdateProfileInput = z.infer<typeof updateProfileSchema>;
export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;
export type UserSearchFilter = z.infer<typeof userSearchSchema>;
