/**
 * Authorization policies. Pure decisions with no side effects; the service
 * layer turns a refusal into a PermissionDeniedError.
 */

export {
  canAssignTask,
  canCommentOnTask,
  canDeleteTask,
  canModifyTask,
} from './taskPolicy.ts';
export { canModifyProject } from './projectPolicy.ts';
export { canManageTeam } from './teamPolicy.ts';
export { canChangeUserRole, wouldRemoveLastAdmin } from './userPolicy.ts';
