/**
 * SQLite-backed repository (better-sqlite3).
 *
 * One table per entity kind with the record stored as JSON text. Row order
 * follows insertion (rowid), which upserts keep stable.
 */

import type Database from 'better-sqlite3';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { Entity, EntityCodec } from '../models/index.ts';
import { createChildLogger } from '../utils/logging/logger.ts';
import { ensureId } from './InMemoryRepository.ts';
import type { Repository } from './types.ts';

const moduleLogger = createChildLogger('sqlite-repository');

const recordRowSchema = z.object({
  id: z.string(),
  data: z.string(),
});

const countRowSchema = z.object({
  count: z.number().int(),
});

/** Table names are fixed identifiers, never user input */
export type SqliteTable = 'users' | 'tasks' | 'projects' | 'teams';

export class SqliteRepository<TEntity extends Entity<unknown>>
  implements Repository<TEntity>
{
  constructor(
    private readonly db: Database.Database,
    private readonly table: SqliteTable,
    private readonly codec: EntityCodec<TEntity>,
    private readonly logger: Logger = moduleLogger,
  ) {
    this.db.exec(
      `CREATE TABLE IF NOT EXISTS ${table} (id TEXT PRIMARY KEY, data TEXT NOT NULL)`,
    );
  }

  save(entity: TEntity): TEntity {
    const persist = this.db.transaction((target: TEntity) => {
      const id = ensureId(target);
      this.db
        .prepare(
          `INSERT INTO ${this.table} (id, data) VALUES (?, ?)
           ON CONFLICT(id) DO UPDATE SET data = excluded.data`,
        )
        .run(id, JSON.stringify(target.toRecord()));
    });

    try {
      persist(entity);
    } catch (error) {
      this.logger.error(
        { err: error, table: this.table, operation: 'save' },
        `Failed to save ${this.table} row`,
      );
      throw error;
    }
    return entity;
  }

  getById(id: string): TEntity | null {
    const row = this.db
      .prepare(`SELECT id, data FROM ${this.table} WHERE id = ?`)
      .get(id);
    if (row === undefined) {
      return null;
    }
    return this.decode(row);
  }

  getAll(): TEntity[] {
    return this.db
      .prepare(`SELECT id, data FROM ${this.table} ORDER BY rowid`)
      .all()
      .map((row) => this.decode(row));
  }

  delete(id: string): boolean {
    const result = this.db
      .prepare(`DELETE FROM ${this.table} WHERE id = ?`)
      .run(id);
    return result.changes > 0;
  }

  exists(id: string): boolean {
    return (
      this.db.prepare(`SELECT 1 FROM ${this.table} WHERE id = ?`).get(id) !==
      undefined
    );
  }

  count(): number {
    const row = this.db
      .prepare(`SELECT COUNT(*) AS count FROM ${this.table}`)
      .get();
    return countRowSchema.parse(row).count;
  }

  clear(): void {
    this.db.prepare(`DELETE FROM ${this.table}`).run();
  }

  private decode(row: unknown): TEntity {
    const { id, data } = recordRowSchema.parse(row);
    let record: unknown;
    try {
      record = JSON.parse(data);
    } catch (error) {
      this.logger.error(
        { err: error, table: this.table, id },
        'Stored record is not valid JSON',
      );
      throw error;
    }
    return this.codec.fromRecord(record);
  }
}
