import type { UserRole } from '@worklane/types';
import type { User } from '../models/index.ts';

/** Promotion, demotion and deactivation are admin-only */
export function canChangeUserRole(actor: User): boolean {
  return actor.isAdmin;
}

/**
 * True when moving `target` to `nextRole` would leave no admin.
 * `adminCount` must be counted from storage right before the change.
 */
export function wouldRemoveLastAdmin(
  target: User,
  nextRole: UserRole,
  adminCount: number,
): boolean {
  return target.isAdmin && nextRole !== 'admin' && adminCount <= 1;
}
