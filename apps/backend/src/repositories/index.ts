/**
 * Repository wiring for the configured storage driver.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import type { Logger } from 'pino';
import type { Config } from '../config/default.ts';
import { Project, Task, Team, User } from '../models/index.ts';
import { createChildLogger } from '../utils/logging/logger.ts';
import { InMemoryRepository } from './InMemoryRepository.ts';
import { SqliteRepository } from './SqliteRepository.ts';
import type { Repositories } from './types.ts';

const moduleLogger = createChildLogger('repositories');

/**
 * In-memory collections. A failed transaction restores every collection to
 * its contents from before the transaction started.
 */
export function createInMemoryRepositories(): Repositories {
  const users = new InMemoryRepository(User);
  const tasks = new InMemoryRepository(Task);
  const projects = new InMemoryRepository(Project);
  const teams = new InMemoryRepository(Team);
  const all = [users, tasks, projects, teams] as const;
  let depth = 0;

  return {
    users,
    tasks,
    projects,
    teams,
    runInTransaction<T>(work: () => T): T {
      if (depth > 0) {
        return work();
      }

      const snapshots = all.map((repository) => repository.snapshot());
      depth += 1;
      try {
        return work();
      } catch (error) {
        all.forEach((repository, index) => {
          const snapshot = snapshots[index];
          if (snapshot) {
            repository.restore(snapshot);
          }
        });
        throw error;
      } finally {
        depth -= 1;
      }
    },
    close() {
      all.forEach((repository) => repository.clear());
    },
  };
}

/**
 * SQLite collections sharing one connection. Pass `':memory:'` for a
 * throwaway database.
 */
export function createSqliteRepositories(
  filename: string,
  logger: Logger = moduleLogger,
): Repositories {
  const db = new Database(filename);
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
  }

  logger.info({ filename }, 'Opened SQLite storage');

  return {
    users: new SqliteRepository(db, 'users', User, logger),
    tasks: new SqliteRepository(db, 'tasks', Task, logger),
    projects: new SqliteRepository(db, 'projects', Project, logger),
    teams: new SqliteRepository(db, 'teams', Team, logger),
    runInTransaction<T>(work: () => T): T {
      return db.transaction(work)();
    },
    close() {
      db.close();
    },
  };
}

/**
 * Build the repositories selected by `config.storage.driver`.
 */
export function createRepositories(
  appConfig: Config,
  logger: Logger = moduleLogger,
): Repositories {
  if (appConfig.storage.driver === 'sqlite') {
    fs.mkdirSync(appConfig.storage.base, { recursive: true });
    return createSqliteRepositories(appConfig.storage.databaseFile, logger);
  }

  logger.debug('Using in-memory storage');
  return createInMemoryRepositories();
}

export { InMemoryRepository, ensureId } from './InMemoryRepository.ts';
export { SqliteRepository } from './SqliteRepository.ts';
export type { SqliteTable } from './SqliteRepository.ts';
export type { Repositories, Repository } from './types.ts';
