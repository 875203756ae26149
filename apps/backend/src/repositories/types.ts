/**
 * Storage contract shared by every entity collection.
 *
 * Implementations keep serialized records, never live entity instances:
 * each read rebuilds a fresh entity through its codec, so a mutation that
 * fails part-way never reaches storage.
 */

import type { Entity, Project, Task, Team, User } from '../models/index.ts';

export interface Repository<TEntity extends Entity<unknown>> {
  /** Persist the entity, assigning an ID first when it has none */
  save(entity: TEntity): TEntity;
  getById(id: string): TEntity | null;
  getAll(): TEntity[];
  /** Returns false when no entity had that ID */
  delete(id: string): boolean;
  exists(id: string): boolean;
  count(): number;
  clear(): void;
}

/** The four collections plus a way to group writes */
export interface Repositories {
  users: Repository<User>;
  tasks: Repository<Task>;
  projects: Repository<Project>;
  teams: Repository<Team>;
  /**
   * Run `work` so that its writes commit together or not at all.
   * Returns whatever `work` returns.
   */
  runInTransaction<T>(work: () => T): T;
  close(): void;
}
