/**
 * User Service - account lifecycle, credentials and role management.
 *
 * Features:
 * - Registration with normalized, unique usernames and emails
 * - Password authentication and rotation
 * - Admin-only role changes that never leave the system without an admin
 * - Search and aggregate statistics computed from full scans
 */
import type { Logger } from 'pino';
import {
  changePasswordSchema,
  createUserSchema,
  emailSchema,
  passwordSchema,
  userSearchSchema,
  usernameSchema,
} from '@worklane/types';
import type {
  CreateUserInput,
  UserActivitySummary,
  UserRole,
  UserStatistics,
} from '@worklane/types';
import type { ZodType, ZodTypeDef } from 'zod';
import { TIME } from '../constants.ts';
import { User } from '../models/index.ts';
import { canChangeUserRole, wouldRemoveLastAdmin } from '../policies/index.ts';
import type { Repositories } from '../repositories/index.ts';
import {
  AlreadyExistsError,
  InvalidTransitionError,
  PermissionDeniedError,
} from '../types/errors.ts';
import { createChildLogger } from '../utils/logging/logger.ts';
import { parseWith } from '../utils/validation.ts';
import {
  logServiceFailure,
  matchesQuery,
  requireEntity,
} from './serviceSupport.ts';

// Module-level logger; public methods accept a logger for request-scoped logging
const moduleLogger = createChildLogger('user-service');

/** Fields accepted by `validateUserData` */
export type UserDataCandidate = {
  username?: string;
  email?: string;
  password?: string;
};

/** Field name -> messages, only for fields that failed */
export type UserDataErrors = Partial<
  Record<keyof UserDataCandidate, string[]>
>;

function issueMessages<TOutput>(
  schema: ZodType<TOutput, ZodTypeDef, string>,
  value: string,
): string[] {
  const result = schema.safeParse(value);
  return result.success ? [] : result.error.issues.map((i) => i.message);
}

class UserService {
  constructor(private readonly repositories: Repositories) {}

  private get users() {
    return this.repositories.users;
  }

  /**
   * Register a new user.
   * @throws ValidationError for malformed fields
   * @throws AlreadyExistsError when the username or email is taken
   */
  createUser(input: CreateUserInput, logger: Logger = moduleLogger): User {
    try {
      const data = parseWith(createUserSchema, input);
      logger.info(
        { action: 'createUser', username: data.username },
        'Creating user',
      );

      if (this.findByUsername(data.username)) {
        throw new AlreadyExistsError(
          `Username ${data.username} already exists`,
        );
      }
      if (this.findByEmail(data.email)) {
        throw new AlreadyExistsError(`Email ${data.email} already exists`);
      }

      const user = User.create(data);
      this.repositories.runInTransaction(() => this.users.save(user));

      logger.info(
        { action: 'createUser', userId: user.id, username: user.username },
        'User created',
      );
      return user;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'createUser', username: input.username },
        error,
        'Failed to create user',
      );
      throw error;
    }
  }

  getUser(userId: string): User | null {
    return this.users.getById(userId);
  }

  getUserByUsername(username: string): User | null {
    return this.findByUsername(username.trim().toLowerCase());
  }

  getUserByEmail(email: string): User | null {
    return this.findByEmail(email.trim().toLowerCase());
  }

  /** The user when the credentials match, otherwise null */
  authenticateUser(
    username: string,
    password: string,
    logger: Logger = moduleLogger,
  ): User | null {
    const user = this.getUserByUsername(username);
    if (!user || !user.verifyPassword(password)) {
      logger.info(
        { action: 'authenticateUser', username },
        'Authentication failed',
      );
      return null;
    }

    logger.debug(
      { action: 'authenticateUser', userId: user.id },
      'User authenticated',
    );
    return user;
  }

  /**
   * Update profile fields.
   * @throws ValidationError for unknown fields or non-string values
   */
  updateUserProfile(
    userId: string,
    profile: unknown,
    logger: Logger = moduleLogger,
  ): User {
    try {
      const user = requireEntity(this.users, 'User', userId);
      user.updateProfile(profile);
      this.repositories.runInTransaction(() => this.users.save(user));

      logger.info(
        { action: 'updateUserProfile', userId },
        'User profile updated',
      );
      return user;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'updateUserProfile', userId },
        error,
        'Failed to update user profile',
      );
      throw error;
    }
  }

  /**
   * @throws ValidationError (INCORRECT_CREDENTIAL) when the current password is wrong
   */
  changeUserPassword(
    userId: string,
    currentPassword: string,
    newPassword: string,
    logger: Logger = moduleLogger,
  ): User {
    try {
      const data = parseWith(changePasswordSchema, {
        currentPassword,
        newPassword,
      });
      const user = requireEntity(this.users, 'User', userId);
      user.changePassword(data.currentPassword, data.newPassword);
      this.repositories.runInTransaction(() => this.users.save(user));

      logger.info({ action: 'changeUserPassword', userId }, 'Password changed');
      return user;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'changeUserPassword', userId },
        error,
        'Failed to change password',
      );
      throw error;
    }
  }

  /**
   * Promote or demote a user.
   * @throws PermissionDeniedError when the actor is not an admin
   * @throws InvalidTransitionError (LAST_ADMIN) when demoting the only admin
   */
  changeUserRole(
    userId: string,
    role: UserRole,
    actorId: string,
    logger: Logger = moduleLogger,
  ): User {
    try {
      const user = this.applyRoleChange(userId, role, actorId);
      logger.info(
        { action: 'changeUserRole', userId, role, actorId },
        'User role changed',
      );
      return user;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'changeUserRole', userId, role, actorId },
        error,
        'Failed to change user role',
      );
      throw error;
    }
  }

  /**
   * Downgrade a user to `guest`. Same rules as a role change.
   */
  deactivateUser(
    userId: string,
    actorId: string,
    logger: Logger = moduleLogger,
  ): User {
    try {
      const user = this.applyRoleChange(userId, 'guest', actorId);
      logger.info(
        { action: 'deactivateUser', userId, actorId },
        'User deactivated',
      );
      return user;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'deactivateUser', userId, actorId },
        error,
        'Failed to deactivate user',
      );
      throw error;
    }
  }

  getUsersByRole(role: UserRole): User[] {
    return this.users.getAll().filter((user) => user.role === role);
  }

  /** Match username, email, first or last name, optionally within a role */
  searchUsers(query: string, role?: UserRole): User[] {
    const filter = parseWith(userSearchSchema, { query, role });

    return this.users.getAll().filter((user) => {
      if (filter.role && user.role !== filter.role) {
        return false;
      }
      const { firstName, lastName } = user.profile;
      return matchesQuery(
        filter.query,
        user.username,
        user.email,
        firstName,
        lastName,
      );
    });
  }

  getUserStatistics(now: Date = new Date()): UserStatistics {
    const users = this.users.getAll();
    const since = now.getTime() - TIME.RECENT_REGISTRATION_MS;

    const byRole: Record<UserRole, number> = { admin: 0, standard: 0, guest: 0 };
    for (const user of users) {
      byRole[user.role] += 1;
    }

    return {
      total: users.length,
      byRole,
      recentRegistrations: users.filter(
        (user) => user.createdAt.getTime() >= since,
      ).length,
    };
  }

  /**
   * @throws NotFoundError for an unknown user
   */
  getUserActivitySummary(userId: string): UserActivitySummary {
    const user = requireEntity(this.users, 'User', userId);

    return {
      userId,
      username: user.username,
      email: user.email,
      role: user.role,
      isAdmin: user.isAdmin,
      profile: { ...user.profile, fullName: user.fullName },
      permissions: [...user.permissions],
      createdAt: user.createdAt.toISOString(),
      lastUpdated: user.updatedAt.toISOString(),
    };
  }

  /**
   * Pre-validate registration fields without creating anything.
   * Only fields with at least one problem appear in the result.
   */
  validateUserData(candidate: UserDataCandidate): UserDataErrors {
    const errors: UserDataErrors = {};

    if (candidate.username !== undefined) {
      const messages = issueMessages(usernameSchema, candidate.username);
      if (messages.length === 0 && this.getUserByUsername(candidate.username)) {
        messages.push('Username already exists');
      }
      if (messages.length > 0) {
        errors.username = messages;
      }
    }

    if (candidate.email !== undefined) {
      const messages = issueMessages(emailSchema, candidate.email);
      if (messages.length === 0 && this.getUserByEmail(candidate.email)) {
        messages.push('Email already exists');
      }
      if (messages.length > 0) {
        errors.email = messages;
      }
    }

    if (candidate.password !== undefined) {
      const messages = issueMessages(passwordSchema, candidate.password);
      if (messages.length > 0) {
        errors.password = messages;
      }
    }

    return errors;
  }

  private applyRoleChange(
    userId: string,
    role: UserRole,
    actorId: string,
  ): User {
    const user = requireEntity(this.users, 'User', userId);
    const actor = requireEntity(this.users, 'User', actorId, 'Acting user');

    if (!canChangeUserRole(actor)) {
      throw new PermissionDeniedError(
        `User ${actorId} does not have permission to change user roles`,
      );
    }

    const adminCount = this.users.getAll().filter((u) => u.isAdmin).length;
    if (wouldRemoveLastAdmin(user, role, adminCount)) {
      throw new InvalidTransitionError(
        `Cannot remove the last admin (${user.username})`,
        'LAST_ADMIN',
      );
    }

    user.changeRole(role);
    this.repositories.runInTransaction(() => this.users.save(user));
    return user;
  }

  private findByUsername(username: string): User | null {
    return this.users.getAll().find((u) => u.username === username) ?? null;
  }

  private findByEmail(email: string): User | null {
    return this.users.getAll().find((u) => u.email === email) ?? null;
  }
}

export { UserService };
