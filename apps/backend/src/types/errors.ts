/**
 * Domain error types.
 *
 * Every failure raised by the entities, policies and services is one of the
 * classes below. Each carries a machine-readable `code` and the HTTP-style
 * `statusCode` a transport layer would map it to.
 */

/** Error codes raised by the domain */
export type DomainErrorCode =
  | 'VALIDATION_ERROR'
  | 'INCORRECT_CREDENTIAL'
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'INVALID_TRANSITION'
  | 'CANNOT_REMOVE_LEADER'
  | 'LAST_ADMIN'
  | 'ALREADY_EXISTS'
  | 'ALREADY_MEMBER';

/** Entity kinds that can be referenced by ID */
export type EntityKind = 'User' | 'Task' | 'Project' | 'Team';

/**
 * Base class for all recoverable domain failures.
 */
export class DomainError extends Error {
  readonly code: DomainErrorCode;
  readonly statusCode: number;

  constructor(message: string, code: DomainErrorCode, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

/**
 * Validation error detail for a single offending field.
 */
export type ValidationErrorDetail = {
  /** Dotted path to the invalid field */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Zod issue code */
  code: string;
};

/** Malformed or empty required field, bad credentials shape */
export class ValidationError extends DomainError {
  readonly details: ValidationErrorDetail[];

  constructor(
    message: string,
    options: {
      code?: 'VALIDATION_ERROR' | 'INCORRECT_CREDENTIAL';
      details?: ValidationErrorDetail[];
    } = {},
  ) {
    super(message, options.code ?? 'VALIDATION_ERROR', 400);
    this.details = options.details ?? [];
  }
}

/** A referenced entity ID is absent from storage */
export class NotFoundError extends DomainError {
  readonly entity: EntityKind;
  readonly id: string;

  constructor(entity: EntityKind, id: string, label: string = entity) {
    super(`${label} with ID ${id} not found`, 'NOT_FOUND', 404);
    this.entity = entity;
    this.id = id;
  }
}

/** The authorization policy refused the acting user */
export class PermissionDeniedError extends DomainError {
  constructor(message: string) {
    super(message, 'PERMISSION_DENIED', 403);
  }
}

/** An entity rule forbids the requested state change */
export class InvalidTransitionError extends DomainError {
  constructor(
    message: string,
    code: 'INVALID_TRANSITION' | 'CANNOT_REMOVE_LEADER' | 'LAST_ADMIN' = 'INVALID_TRANSITION',
  ) {
    super(message, code, 409);
  }
}

/** Duplicate username/email, or duplicate team membership */
export class AlreadyExistsError extends DomainError {
  constructor(
    message: string,
    code: 'ALREADY_EXISTS' | 'ALREADY_MEMBER' = 'ALREADY_EXISTS',
  ) {
    super(message, code, 409);
  }
}

/**
 * Type guard for domain errors.
 */
export function isDomainError(value: unknown): value is DomainError {
  return value instanceof DomainError;
}
