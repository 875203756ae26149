/**
 * Models Module
 *
 * Clean exports for the Worklane entities
 */

export { Task } from './Task.ts';
export type { TaskComment, NewTaskOptions } from './Task.ts';
export { Project } from './Project.ts';
export type { Milestone, NewProjectOptions } from './Project.ts';
export { Team } from './Team.ts';
export type { TeamMember, NewTeamOptions } from './Team.ts';
export { User } from './User.ts';
export type { NewUserOptions } from './User.ts';
export { getTeamRolePermissions } from './teamPermissions.ts';
export { getUserRolePermissions } from './userPermissions.ts';
export type { Entity, EntityCodec } from './types.ts';
