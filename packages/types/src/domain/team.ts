/**
 * Team Domain Types
 *
 * Teams hold a roster of users with per-member roles and a list of
 * associated projects.
 */

/** Roles a user can hold inside a team */
export type TeamRole = 'leader' | 'member' | 'contributor';

/** Permissions granted by a team role */
export type TeamPermission =
  | 'team.manage'
  | 'project.create'
  | 'project.assign'
  | 'project.view'
  | 'member.add'
  | 'member.remove'
  | 'member.promote'
  | 'task.create'
  | 'task.assign'
  | 'task.view'
  | 'comment.add'
  | 'milestone.view';

/** All team roles */
export const TEAM_ROLES: ReadonlyArray<TeamRole> = [
  'leader',
  'member',
  'contributor',
];

/** Serialized team membership */
export type TeamMemberRecord = {
  /** Member user ID (weak reference) */
  userId: string;
  role: TeamRole;
  /** ISO timestamp of joining */
  joinedAt: string;
  /** Permissions derived from the role */
  permissions: Array<TeamPermission>;
};

/** Serialized team as persisted by a repository */
export type TeamRecord = {
  id: string;
  name: string;
  description: string;
  /** Current leader user ID (weak reference) */
  leaderId: string | null;
  members: Array<TeamMemberRecord>;
  /** Associated project IDs (weak references) */
  projectIds: Array<string>;
  createdAt: string;
  updatedAt: string;
};

/** Statistics for a single team */
export type TeamStatistics = {
  totalMembers: number;
  totalProjects: number;
  roleDistribution: Record<TeamRole, number>;
  createdAt: string;
  lastUpdated: string;
};

/** Performance snapshot for a single team */
export type TeamPerformanceMetrics = {
  teamId: string;
  name: string;
  memberCount: number;
  projectCount: number;
  roleDistribution: Record<TeamRole, number>;
  createdAt: string;
  lastUpdated: string;
};

/** Aggregate statistics across every team */
export type TeamCollectionStatistics = {
  total: number;
  totalMembers: number;
  totalProjects: number;
  averageTeamSize: number;
  largestTeamSize: number;
  smallestTeamSize: number;
};
