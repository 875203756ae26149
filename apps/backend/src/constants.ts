/**
 * Application-wide constants.
 */

/** PBKDF2 parameters for stored credentials */
export const PASSWORD_HASHING = {
  DIGEST: 'sha256',
  KEY_LENGTH_BYTES: 32,
  SALT_LENGTH_BYTES: 16,
  ITERATIONS_DEFAULT: 100_000,
  ITERATIONS_MIN: 1_000,
} as const;

/** Time spans in milliseconds */
export const TIME = {
  ONE_DAY_MS: 24 * 60 * 60 * 1000,
  /** Window used for "recent registrations" in user statistics */
  RECENT_REGISTRATION_MS: 30 * 24 * 60 * 60 * 1000,
} as const;

/** Progress reported by a single task for each status */
export const TASK_STATUS_PROGRESS = {
  todo: 0,
  in_progress: 50,
  review: 75,
  done: 100,
  cancelled: 0,
} as const;
