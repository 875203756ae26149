/**
 * User - identity, credentials, profile and global role.
 *
 * The permission set is a pure function of the role and is recomputed on
 * every role change. Passwords are kept only as a salted PBKDF2 digest.
 */

import {
  emailSchema,
  passwordSchema,
  updateProfileSchema,
  userRecordSchema,
  usernameSchema,
} from '@worklane/types';
import type {
  UserPermission,
  UserProfile,
  UserRecord,
  UserRole,
} from '@worklane/types';
import { ValidationError } from '../types/errors.ts';
import { hashPassword, verifyPassword } from '../utils/passwordHash.ts';
import { parseWith } from '../utils/validation.ts';
import type { Entity } from './types.ts';
import { getUserRolePermissions } from './userPermissions.ts';

/** Options for creating a new user */
export type NewUserOptions = {
  username: string;
  email: string;
  password: string;
  role?: UserRole;
  profile?: Partial<UserProfile>;
};

type UserState = {
  id: string | null;
  username: string;
  email: string;
  passwordHash: string;
  role: UserRole;
  profile: UserProfile;
  createdAt: Date;
  updatedAt: Date;
};

export class User implements Entity<UserRecord> {
  private _id: string | null;
  private readonly _username: string;
  private readonly _email: string;
  private _passwordHash: string;
  private _role: UserRole;
  private _permissions: UserPermission[];
  private readonly _profile: UserProfile;
  private readonly _createdAt: Date;
  private _updatedAt: Date;

  private constructor(state: UserState) {
    this._id = state.id;
    this._username = state.username;
    this._email = state.email;
    this._passwordHash = state.passwordHash;
    this._role = state.role;
    this._permissions = getUserRolePermissions(state.role);
    this._profile = { ...state.profile };
    this._createdAt = state.createdAt;
    this._updatedAt = state.updatedAt;
  }

  /**
   * Create a new, unsaved user (`id` is null until first save).
   * @throws ValidationError for a malformed username, email or password
   */
  static create(options: NewUserOptions): User {
    const now = new Date();
    const username = parseWith(usernameSchema, options.username);
    const email = parseWith(emailSchema, options.email);
    const password = parseWith(passwordSchema, options.password);
    const profile = parseWith(updateProfileSchema, options.profile ?? {});

    return new User({
      id: null,
      username,
      email,
      passwordHash: hashPassword(password),
      role: options.role ?? 'standard',
      profile: {
        firstName: profile.firstName ?? '',
        lastName: profile.lastName ?? '',
        bio: profile.bio ?? '',
      },
      createdAt: now,
      updatedAt: now,
    });
  }

  /**
   * Rebuild a user from its serialized record. The permission set is derived
   * from the role, not read from the record.
   * @throws ValidationError when the record is malformed
   */
  static fromRecord(record: unknown): User {
    const data = parseWith(userRecordSchema, record);

    return new User({
      id: data.id,
      username: data.username,
      email: data.email,
      passwordHash: data.passwordHash,
      role: data.role,
      profile: data.profile,
      createdAt: new Date(data.createdAt),
      updatedAt: new Date(data.updatedAt),
    });
  }

  get id(): string | null {
    return this._id;
  }

  get username(): string {
    return this._username;
  }

  get email(): string {
    return this._email;
  }

  get role(): UserRole {
    return this._role;
  }

  get isAdmin(): boolean {
    return this._role === 'admin';
  }

  get permissions(): ReadonlyArray<UserPermission> {
    return [...this._permissions];
  }

  get profile(): Readonly<UserProfile> {
    return { ...this._profile };
  }

  get fullName(): string {
    return `${this._profile.firstName} ${this._profile.lastName}`.trim();
  }

  get createdAt(): Date {
    return new Date(this._createdAt.getTime());
  }

  get updatedAt(): Date {
    return new Date(this._updatedAt.getTime());
  }

  /**
   * Assign the storage identifier.
   * @throws ValidationError when an ID is already assigned or `id` is empty
   */
  assignId(id: string): void {
    if (this._id !== null) {
      throw new ValidationError(
        `User ${this._username} already has ID ${this._id}`,
      );
    }
    if (!id.trim()) {
      throw new ValidationError('Invalid user ID');
    }
    this._id = id;
  }

  verifyPassword(password: string): boolean {
    return verifyPassword(password, this._passwordHash);
  }

  /**
   * Replace the password after verifying the current one.
   * @throws ValidationError (INCORRECT_CREDENTIAL) when `currentPassword` does not verify
   * @throws ValidationError when `newPassword` is too short
   */
  changePassword(currentPassword: string, newPassword: string): void {
    if (!this.verifyPassword(currentPassword)) {
      throw new ValidationError('Current password incorrect', {
        code: 'INCORRECT_CREDENTIAL',
      });
    }

    this._passwordHash = hashPassword(parseWith(passwordSchema, newPassword));
    this.touch();
  }

  /**
   * Update free-text profile fields.
   * @throws ValidationError for unknown fields or non-string values
   */
  updateProfile(changes: unknown): void {
    const profile = parseWith(updateProfileSchema, changes);

    if (profile.firstName !== undefined) {
      this._profile.firstName = profile.firstName;
    }
    if (profile.lastName !== undefined) {
      this._profile.lastName = profile.lastName;
    }
    if (profile.bio !== undefined) {
      this._profile.bio = profile.bio;
    }
    this.touch();
  }

  /** Set the role and recompute the permission set in one step */
  changeRole(role: UserRole): void {
    this._role = role;
    this._permissions = getUserRolePermissions(role);
    this.touch();
  }

  hasPermission(permission: UserPermission): boolean {
    return this._permissions.includes(permission);
  }

  toRecord(): UserRecord {
    return {
      id: this._id,
      username: this._username,
      email: this._email,
      passwordHash: this._passwordHash,
      role: this._role,
      profile: { ...this._profile },
      permissions: [...this._permissions],
      createdAt: this._createdAt.toISOString(),
      updatedAt: this._updatedAt.toISOString(),
    };
  }

  toString(): string {
    return `User(${this._username}, ${this._email})`;
  }

  private touch(): void {
    this._updatedAt = new Date();
  }
}
