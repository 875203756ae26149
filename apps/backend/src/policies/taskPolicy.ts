/**
 * Task authorization rules.
 */

import type { Task, User } from '../models/index.ts';

/** Admins and the current assignee may modify a task */
export function canModifyTask(actor: User, task: Task): boolean {
  if (actor.isAdmin) {
    return true;
  }
  return actor.id !== null && actor.id === task.assigneeId;
}

/** Only admins may (re)assign tasks */
export function canAssignTask(actor: User, _task: Task): boolean {
  return actor.isAdmin;
}

/** Deletion is admin-only */
export function canDeleteTask(actor: User, _task: Task): boolean {
  return actor.isAdmin;
}

export function canCommentOnTask(actor: User, task: Task): boolean {
  return canModifyTask(actor, task);
}
