/**
 * @worklane/types
 *
 * Shared TypeScript types and validation schemas for the Worklane monorepo.
 *
 * @example
 * ```typescript
 * // Import domain types
 * import type { TaskRecord, TeamRole } from '@worklane/types';
 *
 * // Import validation schemas
 * import { createTaskSchema } from '@worklane/types/validation';
 * ```
 */

// Domain types
export * from './domain/index.js';

// Validation schemas
export * from './validation/index.js';
