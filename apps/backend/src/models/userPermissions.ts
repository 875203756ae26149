import type { UserPermission, UserRole } from '@worklane/types';

const USER_ROLE_PERMISSIONS: Readonly<
  Record<UserRole, ReadonlyArray<UserPermission>>
> = {
  admin: ['admin.panel', 'user.manage', 'system.settings'],
  standard: ['profile.update', 'content.create'],
  guest: ['content.read'],
};

/**
 * Permission set granted by a global user role.
 * Returns a fresh array on every call.
 */
export function getUserRolePermissions(role: UserRole): UserPermission[] {
  return [...USER_ROLE_PERMISSIONS[role]];
}
