/**
 * Team - a roster of users with per-member roles, plus associated projects.
 *
 * Invariants:
 * - a user appears at most once in the member list
 * - the current leader (`leaderId`) can never be removed
 * - member permissions always match the member's role
 */

import { teamNameSchema, teamRecordSchema } from '@worklane/types';
import type {
  TeamPermission,
  TeamRecord,
  TeamRole,
  TeamStatistics,
} from '@worklane/types';
import {
  AlreadyExistsError,
  InvalidTransitionError,
  ValidationError,
} from '../types/errors.ts';
import { generateId } from '../utils/generateId.ts';
import { parseWith } from '../utils/validation.ts';
import { getTeamRolePermissions } from './teamPermissions.ts';
import type { Entity } from './types.ts';

export type TeamMember = {
  readonly userId: string;
  readonly role: TeamRole;
  readonly joinedAt: Date;
  readonly permissions: ReadonlyArray<TeamPermission>;
};

/** Options for creating a new team */
export type NewTeamOptions = {
  name: string;
  description?: string;
  leaderId?: string | null;
};

type MutableTeamMember = {
  userId: string;
  role: TeamRole;
  joinedAt: Date;
  permissions: TeamPermission[];
};

type TeamState = {
  id: string;
  name: string;
  description: string;
  leaderId: string | null;
  members: MutableTeamMember[];
  projectIds: string[];
  createdAt: Date;
  updatedAt: Date;
};

function copyMember(member: MutableTeamMember): TeamMember {
  return {
    userId: member.userId,
    role: member.role,
    joinedAt: new Date(member.joinedAt.getTime()),
    permissions: [...member.permissions],
  };
}

export class Team implements Entity<TeamRecord> {
  private readonly _id: string;
  private _name: string;
  private _description: string;
  private _leaderId: string | null;
  private readonly _members: MutableTeamMember[];
  private readonly _projectIds: string[];
  private readonly _createdAt: Date;
  private _updatedAt: Date;

  private constructor(state: TeamState) {
    this._id = state.id;
    this._name = state.name;
    this._description = state.description;
    this._leaderId = state.leaderId;
    this._members = state.members;
    this._projectIds = state.projectIds;
    this._createdAt = state.createdAt;
    this._updatedAt = state.updatedAt;
  }

  /**
   * Create a new team. A leader, when given, is enrolled as a `leader`
   * member.
   * @throws ValidationError when the name is blank
   */
  static create(options: NewTeamOptions): Team {
    const now = new Date();
    const team = new Team({
      id: generateId(),
      name: parseWith(teamNameSchema, options.name),
      description: options.description ?? '',
      leaderId: options.leaderId ?? null,
      members: [],
      projectIds: [],
      createdAt: now,
      updatedAt: now,
    });

    if (options.leaderId) {
      team.addMember(options.leaderId, 'leader');
    }

    return team;
  }

  /**
   * Rebuild a team from its serialized record.
   * @throws ValidationError when the record is malformed or lists a user twice
   */
  static fromRecord(record: unknown): Team {
    const data = parseWith(teamRecordSchema, record);

    const seen = new Set<string>();
    for (const member of data.members) {
      if (seen.has(member.userId)) {
        throw new ValidationError(
          `Team record ${data.id} lists user ${member.userId} more than once`,
        );
      }
      seen.add(member.userId);
    }

    return new Team({
      id: data.id,
      name: data.name,
      description: data.description,
      leaderId: data.leaderId,
      members: data.members.map((member) => ({
        userId: member.userId,
        role: member.role,
        joinedAt: new Date(member.joinedAt),
        permissions: getTeamRolePermissions(member.role),
      })),
      projectIds: [...data.projectIds],
      createdAt: new Date(data.createdAt),
      updatedAt: new Date(data.updatedAt),
    });
  }

  get id(): string {
    return this._id;
  }

  get name(): string {
    return this._name;
  }

  get description(): string {
    return this._description;
  }

  get leaderId(): string | null {
    return this._leaderId;
  }

  get members(): ReadonlyArray<TeamMember> {
    return this._members.map(copyMember);
  }

  get projectIds(): ReadonlyArray<string> {
    return [...this._projectIds];
  }

  get createdAt(): Date {
    return new Date(this._createdAt.getTime());
  }

  get updatedAt(): Date {
    return new Date(this._updatedAt.getTime());
  }

  assignId(id: string): void {
    throw new ValidationError(
      `Team ${this._id} already has an ID; cannot reassign to ${id}`,
    );
  }

  rename(name: string): void {
    this._name = parseWith(teamNameSchema, name);
    this.touch();
  }

  describe(description: string): void {
    this._description = description;
    this.touch();
  }

  /**
   * Enroll a user.
   * @throws AlreadyExistsError (ALREADY_MEMBER) when the user is already enrolled
   */
  addMember(userId: string, role: TeamRole = 'member'): TeamMember {
    if (this.isMember(userId)) {
      throw new AlreadyExistsError(
        `User ${userId} is already a member of team ${this._name}`,
        'ALREADY_MEMBER',
      );
    }

    const member: MutableTeamMember = {
      userId,
      role,
      joinedAt: new Date(),
      permissions: getTeamRolePermissions(role),
    };
    this._members.push(member);
    this.touch();
    return copyMember(member);
  }

  /**
   * Remove a member. Returns false when the user is not enrolled.
   * @throws InvalidTransitionError (CANNOT_REMOVE_LEADER) for the current leader
   */
  removeMember(userId: string): boolean {
    if (this._leaderId !== null && userId === this._leaderId) {
      throw new InvalidTransitionError(
        `Cannot remove team leader ${userId} from team ${this._name}`,
        'CANNOT_REMOVE_LEADER',
      );
    }

    const index = this._members.findIndex((m) => m.userId === userId);
    if (index === -1) {
      return false;
    }

    this._members.splice(index, 1);
    this.touch();
    return true;
  }

  /**
   * Change a member's role and recompute their permissions.
   * Returns false when the user is not enrolled.
   */
  promoteMember(userId: string, role: TeamRole): boolean {
    const member = this._members.find((m) => m.userId === userId);
    if (!member) {
      return false;
    }

    member.role = role;
    member.permissions = getTeamRolePermissions(role);
    this.touch();
    return true;
  }

  /**
   * Make a user the leader, enrolling them as `leader` when they are not a
   * member yet. The previous leader keeps their membership.
   */
  changeLeader(userId: string): void {
    if (this.isMember(userId)) {
      this.promoteMember(userId, 'leader');
    } else {
      this.addMember(userId, 'leader');
    }

    this._leaderId = userId;
    this.touch();
  }

  isMember(userId: string): boolean {
    return this._members.some((m) => m.userId === userId);
  }

  getMemberRole(userId: string): TeamRole | null {
    return this._members.find((m) => m.userId === userId)?.role ?? null;
  }

  hasPermission(userId: string, permission: TeamPermission): boolean {
    const member = this._members.find((m) => m.userId === userId);
    return member ? member.permissions.includes(permission) : false;
  }

  getMemberCount(): number {
    return this._members.length;
  }

  getLeaders(): TeamMember[] {
    return this.getMembersByRole('leader');
  }

  getMembersByRole(role: TeamRole): TeamMember[] {
    return this._members.filter((m) => m.role === role).map(copyMember);
  }

  getRoleDistribution(): Record<TeamRole, number> {
    return {
      leader: this.getMembersByRole('leader').length,
      member: this.getMembersByRole('member').length,
      contributor: this.getMembersByRole('contributor').length,
    };
  }

  /** Associate a project. Returns false when already associated. */
  addProject(projectId: string): boolean {
    if (this._projectIds.includes(projectId)) {
      return false;
    }
    this._projectIds.push(projectId);
    this.touch();
    return true;
  }

  /** Dissociate a project. Returns false when it was not associated. */
  removeProject(projectId: string): boolean {
    const index = this._projectIds.indexOf(projectId);
    if (index === -1) {
      return false;
    }
    this._projectIds.splice(index, 1);
    this.touch();
    return true;
  }

  getTeamStatistics(): TeamStatistics {
    return {
      totalMembers: this.getMemberCount(),
      totalProjects: this._projectIds.length,
      roleDistribution: this.getRoleDistribution(),
      createdAt: this._createdAt.toISOString(),
      lastUpdated: this._updatedAt.toISOString(),
    };
  }

  toRecord(): TeamRecord {
    return {
      id: this._id,
      name: this._name,
      description: this._description,
      leaderId: this._leaderId,
      members: this._members.map((member) => ({
        userId: member.userId,
        role: member.role,
        joinedAt: member.joinedAt.toISOString(),
        permissions: [...member.permissions],
      })),
      projectIds: [...this._projectIds],
      createdAt: this._createdAt.toISOString(),
      updatedAt: this._updatedAt.toISOString(),
    };
  }

  toString(): string {
    return `Team(${this._name}, ${this._members.length} members)`;
  }

  private touch(): void {
    this._updatedAt = new Date();
  }
}
