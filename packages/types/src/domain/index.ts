/**
 * Domain Types
 */

export * from './task.js';
export * from './project.js';
export * from './team.js';
export * from './user.js';
