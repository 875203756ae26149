/**
 * Backend-specific TypeScript types.
 *
 * @example
 * ```typescript
 * import { NotFoundError, type DomainErrorCode } from '../types/index.ts';
 * ```
 */

export {
  DomainError,
  ValidationError,
  NotFoundError,
  PermissionDeniedError,
  InvalidTransitionError,
  AlreadyExistsError,
  isDomainError,
} from './errors.ts';

export type {
  DomainErrorCode,
  EntityKind,
  ValidationErrorDetail,
} from './errors.ts';
