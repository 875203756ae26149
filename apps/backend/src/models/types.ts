/**
 * Model Types
 *
 * Shared contracts for the Worklane entities.
 */

/**
 * An identity-bearing domain object that serializes to a plain record.
 * `id` is null only for entities whose identifier is assigned on first save.
 */
export interface Entity<TRecord> {
  readonly id: string | null;
  /** Assign the identifier; allowed once */
  assignId(id: string): void;
  /** Structural serialization (strings, numbers, booleans, null, arrays, records) */
  toRecord(): TRecord;
}

/** Rebuilds an entity from its serialized record */
export type EntityCodec<TEntity extends Entity<unknown>> = {
  fromRecord(record: unknown): TEntity;
};
