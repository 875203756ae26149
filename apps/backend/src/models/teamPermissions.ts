import type { TeamPermission, TeamRole } from '@worklane/types';

const TEAM_ROLE_PERMISSIONS: Readonly<
  Record<TeamRole, ReadonlyArray<TeamPermission>>
> = {
  leader: [
    'team.manage',
    'project.create',
    'project.assign',
    'member.add',
    'member.remove',
    'member.promote',
  ],
  member: [
    'project.view',
    'task.create',
    'task.assign',
    'comment.add',
    'milestone.view',
  ],
  contributor: ['project.view', 'task.view', 'comment.add'],
};

/**
 * Default permission set for a team role.
 * Returns a fresh array on every call.
 */
export function getTeamRolePermissions(role: TeamRole): TeamPermission[] {
  return [...TEAM_ROLE_PERMISSIONS[role]];
}
