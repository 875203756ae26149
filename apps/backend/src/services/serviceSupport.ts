/**
 * Helpers shared by the domain services.
 */

import type { Logger } from 'pino';
import type { Entity } from '../models/index.ts';
import type { Repository } from '../repositories/index.ts';
import { isDomainError, NotFoundError } from '../types/errors.ts';
import type { EntityKind } from '../types/errors.ts';

/**
 * Load an entity or fail with NotFoundError naming the missing ID.
 */
export function requireEntity<TEntity extends Entity<unknown>>(
  repository: Repository<TEntity>,
  entity: EntityKind,
  id: string,
  label: string = entity,
): TEntity {
  const found = repository.getById(id);
  if (!found) {
    throw new NotFoundError(entity, id, label);
  }
  return found;
}

/**
 * Log a failed operation before it is rethrown. Domain errors are expected
 * outcomes and go to `warn`; anything else is logged at `error`.
 */
export function logServiceFailure(
  logger: Logger,
  context: { action: string } & Record<string, unknown>,
  error: unknown,
  message: string,
): void {
  if (isDomainError(error)) {
    logger.warn({ ...context, err: error }, message);
  } else {
    logger.error({ ...context, err: error }, message);
  }
}

/**
 * Case-insensitive substring match against any of `fields`.
 * A missing or blank query matches everything.
 */
export function matchesQuery(
  query: string | undefined,
  ...fields: ReadonlyArray<string>
): boolean {
  const needle = query?.trim().toLowerCase();
  if (!needle) {
    return true;
  }
  return fields.some((field) => field.toLowerCase().includes(needle));
}
