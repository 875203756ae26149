import type { Team, User } from '../models/index.ts';

/**
 * Admins, the designated leader and any member holding the `leader` role
 * may manage a team.
 */
export function canManageTeam(actor: User, team: Team): boolean {
  if (actor.isAdmin) {
    return true;
  }
  if (actor.id === null) {
    return false;
  }
  return (
    actor.id === team.leaderId || team.getMemberRole(actor.id) === 'leader'
  );
}
