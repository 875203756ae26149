/**
 * Validation Schemas
 *
 * Zod schemas shared by the entities (field rules, record parsing) and the
 * services (input parsing).
 */

export * from './shared.js';
export * from './task.js';
export * from './project.js';
export * from './team.js';
export * from './user.js';
