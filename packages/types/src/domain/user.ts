/**
 * User Domain Types
 *
 * Users carry a global role that determines their permission set.
 */

/** Global user roles */
export type UserRole = 'admin' | 'standard' | 'guest';

/** Permissions granted by a global role */
export type UserPermission =
  | 'admin.panel'
  | 'user.manage'
  | 'system.settings'
  | 'profile.update'
  | 'content.create'
  | 'content.read';

/** All user roles */
export const USER_ROLES: ReadonlyArray<UserRole> = ['admin', 'standard', 'guest'];

/** Free-text profile fields */
export type UserProfile = {
  firstName: string;
  lastName: string;
  bio: string;
};

/** Serialized user as persisted by a repository */
export type UserRecord = {
  /** Null until the user is first saved */
  id: string | null;
  /** Lower-cased username */
  username: string;
  /** Lower-cased email */
  email: string;
  /** `<saltHex>:<digestHex>` credential, never the plaintext */
  passwordHash: string;
  role: UserRole;
  profile: UserProfile;
  /** Permissions derived from the role */
  permissions: Array<UserPermission>;
  createdAt: string;
  updatedAt: string;
};

/** Aggregate user counts computed over a collection scan */
export type UserStatistics = {
  total: number;
  byRole: Record<UserRole, number>;
  /** Users created within the last 30 days */
  recentRegistrations: number;
};

/** Public view of a single user */
export type UserActivitySummary = {
  userId: string;
  username: string;
  email: string;
  role: UserRole;
  isAdmin: boolean;
  profile: UserProfile & { fullName: string };
  permissions: Array<UserPermission>;
  createdAt: string;
  lastUpdated: string;
};
