/**
 * Map-backed repository holding structured clones of entity records.
 */

import type { Entity, EntityCodec } from '../models/index.ts';
import { generateId } from '../utils/generateId.ts';
import type { Repository } from './types.ts';

export class InMemoryRepository<TEntity extends Entity<unknown>>
  implements Repository<TEntity>
{
  private records = new Map<string, unknown>();

  constructor(private readonly codec: EntityCodec<TEntity>) {}

  save(entity: TEntity): TEntity {
    const id = ensureId(entity);
    this.records.set(id, structuredClone(entity.toRecord()));
    return entity;
  }

  getById(id: string): TEntity | null {
    const record = this.records.get(id);
    return record === undefined ? null : this.codec.fromRecord(record);
  }

  getAll(): TEntity[] {
    return [...this.records.values()].map((record) =>
      this.codec.fromRecord(record),
    );
  }

  delete(id: string): boolean {
    return this.records.delete(id);
  }

  exists(id: string): boolean {
    return this.records.has(id);
  }

  count(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
  }

  /** Capture the current contents for a later `restore` */
  snapshot(): Map<string, unknown> {
    return new Map(this.records);
  }

  restore(snapshot: Map<string, unknown>): void {
    this.records = new Map(snapshot);
  }
}

/**
 * Return the entity's ID, assigning a fresh one when it has none.
 */
export function ensureId(entity: Entity<unknown>): string {
  if (entity.id !== null) {
    return entity.id;
  }
  const id = generateId();
  entity.assignId(id);
  return id;
}
