import type { Project, User } from '../models/index.ts';

/**
 * Admins, the owner and anyone on the project roster may modify a project.
 */
export function canModifyProject(actor: User, project: Project): boolean {
  if (actor.isAdmin) {
    return true;
  }
  if (actor.id === null) {
    return false;
  }
  return actor.id === project.ownerId || project.isTeamMember(actor.id);
}
