/**
 * Team Service - team rosters, member roles, leadership and project links.
 *
 * Features:
 * - Leader auto-enrollment on creation
 * - Management restricted to admins, the designated leader and `leader` members
 * - Per-team statistics and collection-wide size aggregates
 */
import type { Logger } from 'pino';
import { createTeamSchema, teamSearchSchema } from '@worklane/types';
import type {
  CreateTeamInput,
  TeamCollectionStatistics,
  TeamPerformanceMetrics,
  TeamPermission,
  TeamRole,
  TeamSearchFilter,
  TeamStatistics,
} from '@worklane/types';
import { Team } from '../models/index.ts';
import type { TeamMember, User } from '../models/index.ts';
import { canManageTeam } from '../policies/index.ts';
import type { Repositories } from '../repositories/index.ts';
import { PermissionDeniedError } from '../types/errors.ts';
import { createChildLogger } from '../utils/logging/logger.ts';
import { parseWith } from '../utils/validation.ts';
import {
  logServiceFailure,
  matchesQuery,
  requireEntity,
} from './serviceSupport.ts';

// Module-level logger; public methods accept a logger for request-scoped logging
const moduleLogger = createChildLogger('team-service');

/** Outcome of a single team mutation; unchanged teams are not saved */
type TeamChange<TResult> = {
  changed: boolean;
  value: TResult;
};

class TeamService {
  constructor(private readonly repositories: Repositories) {}

  private get teams() {
    return this.repositories.teams;
  }

  /**
   * Create a team; the leader, when given, joins as a `leader` member.
   * @throws NotFoundError when the leader does not exist
   */
  createTeam(input: CreateTeamInput, logger: Logger = moduleLogger): Team {
    try {
      const data = parseWith(createTeamSchema, input);
      logger.info(
        { action: 'createTeam', name: data.name, leaderId: data.leaderId },
        'Creating team',
      );

      if (data.leaderId) {
        requireEntity(this.repositories.users, 'User', data.leaderId, 'Leader');
      }

      const team = Team.create(data);
      this.repositories.runInTransaction(() => this.teams.save(team));

      logger.info({ action: 'createTeam', teamId: team.id }, 'Team created');
      return team;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'createTeam', leaderId: input.leaderId },
        error,
        'Failed to create team',
      );
      throw error;
    }
  }

  getTeam(teamId: string): Team | null {
    return this.teams.getById(teamId);
  }

  /**
   * @throws NotFoundError when the user does not exist
   * @throws AlreadyExistsError (ALREADY_MEMBER) when the user is already enrolled
   */
  addTeamMember(
    teamId: string,
    userId: string,
    role: TeamRole,
    actorId: string,
    logger: Logger = moduleLogger,
  ): TeamMember {
    return this.mutate(
      'addTeamMember',
      teamId,
      actorId,
      logger,
      (team) => ({ changed: true, value: team.addMember(userId, role) }),
      { userId, role },
      () => requireEntity(this.repositories.users, 'User', userId),
    );
  }

  /**
   * Returns false when the user is not a member.
   * @throws InvalidTransitionError (CANNOT_REMOVE_LEADER) for the current leader
   */
  removeTeamMember(
    teamId: string,
    userId: string,
    actorId: string,
    logger: Logger = moduleLogger,
  ): boolean {
    return this.mutate(
      'removeTeamMember',
      teamId,
      actorId,
      logger,
      (team) => {
        const removed = team.removeMember(userId);
        return { changed: removed, value: removed };
      },
      { userId },
    );
  }

  /** Returns false when the user is not a member */
  promoteTeamMember(
    teamId: string,
    userId: string,
    role: TeamRole,
    actorId: string,
    logger: Logger = moduleLogger,
  ): boolean {
    return this.mutate(
      'promoteTeamMember',
      teamId,
      actorId,
      logger,
      (team) => {
        const promoted = team.promoteMember(userId, role);
        return { changed: promoted, value: promoted };
      },
      { userId, role },
    );
  }

  /**
   * @throws NotFoundError when the new leader does not exist
   */
  changeTeamLeader(
    teamId: string,
    newLeaderId: string,
    actorId: string,
    logger: Logger = moduleLogger,
  ): Team {
    return this.mutate(
      'changeTeamLeader',
      teamId,
      actorId,
      logger,
      (team) => {
        team.changeLeader(newLeaderId);
        return { changed: true, value: team };
      },
      { newLeaderId },
      () =>
        requireEntity(this.repositories.users, 'User', newLeaderId, 'New leader'),
    );
  }

  /**
   * @throws NotFoundError when the project does not exist
   */
  addProjectToTeam(
    teamId: string,
    projectId: string,
    actorId: string,
    logger: Logger = moduleLogger,
  ): Team {
    return this.mutate(
      'addProjectToTeam',
      teamId,
      actorId,
      logger,
      (team) => ({ changed: team.addProject(projectId), value: team }),
      { projectId },
      () => requireEntity(this.repositories.projects, 'Project', projectId),
    );
  }

  removeProjectFromTeam(
    teamId: string,
    projectId: string,
    actorId: string,
    logger: Logger = moduleLogger,
  ): Team {
    return this.mutate(
      'removeProjectFromTeam',
      teamId,
      actorId,
      logger,
      (team) => ({ changed: team.removeProject(projectId), value: team }),
      { projectId },
    );
  }

  /**
   * Teams the user belongs to or is the designated leader of.
   * @throws NotFoundError for an unknown user
   */
  getUserTeams(userId: string): Team[] {
    requireEntity(this.repositories.users, 'User', userId);
    return this.teams
      .getAll()
      .filter((team) => team.isMember(userId) || team.leaderId === userId);
  }

  getTeamMembers(teamId: string): TeamMember[] {
    return [...requireEntity(this.teams, 'Team', teamId).members];
  }

  getTeamMemberRole(teamId: string, userId: string): TeamRole | null {
    return requireEntity(this.teams, 'Team', teamId).getMemberRole(userId);
  }

  checkTeamPermission(
    teamId: string,
    userId: string,
    permission: TeamPermission,
  ): boolean {
    return requireEntity(this.teams, 'Team', teamId).hasPermission(
      userId,
      permission,
    );
  }

  getTeamStatistics(teamId: string): TeamStatistics {
    return requireEntity(this.teams, 'Team', teamId).getTeamStatistics();
  }

  getTeamPerformanceMetrics(teamId: string): TeamPerformanceMetrics {
    const team = requireEntity(this.teams, 'Team', teamId);
    const statistics = team.getTeamStatistics();

    return {
      teamId,
      name: team.name,
      memberCount: statistics.totalMembers,
      projectCount: statistics.totalProjects,
      roleDistribution: statistics.roleDistribution,
      createdAt: statistics.createdAt,
      lastUpdated: statistics.lastUpdated,
    };
  }

  /** Text match on name or description, optionally for one leader */
  searchTeams(filter: TeamSearchFilter): Team[] {
    const { query, leaderId } = parseWith(teamSearchSchema, filter);

    return this.teams.getAll().filter((team) => {
      if (!matchesQuery(query, team.name, team.description)) return false;
      if (leaderId && team.leaderId !== leaderId) return false;
      return true;
    });
  }

  /** Size aggregates over every team; all zero when there are none */
  getAllTeamsStatistics(): TeamCollectionStatistics {
    const teams = this.teams.getAll();
    const sizes = teams.map((team) => team.getMemberCount());
    const totalMembers = sizes.reduce((sum, size) => sum + size, 0);

    return {
      total: teams.length,
      totalMembers,
      totalProjects: teams.reduce(
        (sum, team) => sum + team.projectIds.length,
        0,
      ),
      averageTeamSize: teams.length > 0 ? totalMembers / teams.length : 0,
      largestTeamSize: sizes.length > 0 ? Math.max(...sizes) : 0,
      smallestTeamSize: sizes.length > 0 ? Math.min(...sizes) : 0,
    };
  }

  private requireActor(actorId: string): User {
    return requireEntity(this.repositories.users, 'User', actorId, 'Acting user');
  }

  /**
   * Resolve the team and any referenced entities, authorize, apply
   * `change` and persist when it reports a change.
   */
  private mutate<TResult>(
    action: string,
    teamId: string,
    actorId: string,
    logger: Logger,
    change: (team: Team) => TeamChange<TResult>,
    context: Record<string, unknown> = {},
    resolveReferences?: () => void,
  ): TResult {
    try {
      const team = requireEntity(this.teams, 'Team', teamId);
      resolveReferences?.();
      const actor = this.requireActor(actorId);

      if (!canManageTeam(actor, team)) {
        throw new PermissionDeniedError(
          `User ${actorId} does not have permission to manage team ${teamId}`,
        );
      }

      const { changed, value } = change(team);
      if (changed) {
        this.repositories.runInTransaction(() => this.teams.save(team));
        logger.info({ action, teamId, actorId, ...context }, 'Team updated');
      } else {
        logger.debug({ action, teamId, actorId, ...context }, 'No change');
      }
      return value;
    } catch (error) {
      logServiceFailure(
        logger,
        { action, teamId, actorId, ...context },
        error,
        `Failed to ${action}`,
      );
      throw error;
    }
  }
}

export { TeamService };
