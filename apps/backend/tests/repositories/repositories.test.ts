import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { Task, User } from '../../src/models/index.ts';
import {
  createInMemoryRepositories,
  createSqliteRepositories,
  SqliteRepository,
  type Repositories,
} from '../../src/repositories/index.ts';
import { ValidationError } from '../../src/types/errors.ts';
import { createTestLogger } from '../fixtures/index.ts';

function newUser(username: string): User {
  return User.create({
    username,
    email: `${username}@example.com`,
    password: 'test-password',
  });
}

describe.each([
  { driver: 'memory', create: () => createInMemoryRepositories() },
  {
    driver: 'sqlite',
    create: () => createSqliteRepositories(':memory:', createTestLogger().logger),
  },
])('$driver repositories', ({ create }) => {
  let repositories: Repositories;

  beforeEach(() => {
    repositories = create();
  });

  afterEach(() => {
    repositories.close();
  });

  it('should assign an ID to an unsaved user on first save', () => {
    const user = newUser('bob');

    repositories.users.save(user);

    expect(user.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(repositories.users.exists(user.id ?? '')).toBe(true);
  });

  it('should keep an existing ID across saves', () => {
    const task = Task.create({ title: 'Write docs' });

    repositories.tasks.save(task);
    task.rename('Write more docs');
    repositories.tasks.save(task);

    expect(repositories.tasks.count()).toBe(1);
    expect(repositories.tasks.getById(task.id)?.title).toBe('Write more docs');
  });

  it('should return fresh entities that do not alias storage', () => {
    const task = Task.create({ title: 'Write docs' });
    repositories.tasks.save(task);

    const loaded = repositories.tasks.getById(task.id);
    loaded?.updateStatus('review');

    expect(loaded).not.toBe(task);
    expect(repositories.tasks.getById(task.id)?.status).toBe('todo');
  });

  it('should list entities in insertion order, also after updates', () => {
    const first = Task.create({ title: 'First' });
    const second = Task.create({ title: 'Second' });
    repositories.tasks.save(first);
    repositories.tasks.save(second);
    first.rename('First again');
    repositories.tasks.save(first);

    expect(repositories.tasks.getAll().map((task) => task.title)).toEqual([
      'First again',
      'Second',
    ]);
  });

  it('should delete, report absent IDs and clear', () => {
    const first = Task.create({ title: 'First' });
    const second = Task.create({ title: 'Second' });
    repositories.tasks.save(first);
    repositories.tasks.save(second);

    expect(repositories.tasks.delete(first.id)).toBe(true);
    expect(repositories.tasks.delete(first.id)).toBe(false);
    expect(repositories.tasks.getById(first.id)).toBeNull();
    expect(repositories.tasks.exists(first.id)).toBe(false);

    repositories.tasks.clear();
    expect(repositories.tasks.count()).toBe(0);
  });

  it('should round-trip users with their credential', () => {
    const user = newUser('bob');
    repositories.users.save(user);

    const loaded = repositories.users.getById(user.id ?? '');

    expect(loaded?.toRecord()).toEqual(user.toRecord());
    expect(loaded?.verifyPassword('test-password')).toBe(true);
  });

  it('should return the value of a committed transaction', () => {
    const result = repositories.runInTransaction(() => {
      repositories.users.save(newUser('bob'));
      repositories.tasks.save(Task.create({ title: 'Write docs' }));
      return 'committed';
    });

    expect(result).toBe('committed');
    expect(repositories.users.count()).toBe(1);
    expect(repositories.tasks.count()).toBe(1);
  });

  it('should roll back every collection when the work throws', () => {
    const kept = Task.create({ title: 'Kept' });
    repositories.tasks.save(kept);

    expect(() =>
      repositories.runInTransaction(() => {
        repositories.users.save(newUser('bob'));
        kept.rename('Renamed');
        repositories.tasks.save(kept);
        repositories.tasks.save(Task.create({ title: 'Extra' }));
        throw new Error('boom');
      }),
    ).toThrow('boom');

    expect(repositories.users.count()).toBe(0);
    expect(repositories.tasks.getAll().map((task) => task.title)).toEqual([
      'Kept',
    ]);
  });

  it('should treat nested transactions as part of the outer one', () => {
    expect(() =>
      repositories.runInTransaction(() => {
        repositories.runInTransaction(() => {
          repositories.users.save(newUser('bob'));
        });
        throw new Error('outer failure');
      }),
    ).toThrow('outer failure');

    expect(repositories.users.count()).toBe(0);
  });
});

describe('SqliteRepository', () => {
  it('should log and rethrow when a stored row is not JSON', () => {
    const db = new Database(':memory:');
    const { logger, getLogsByLevel } = createTestLogger();
    const tasks = new SqliteRepository(db, 'tasks', Task, logger);
    db.prepare('INSERT INTO tasks (id, data) VALUES (?, ?)').run(
      'task-1',
      '{not json',
    );

    expect(() => tasks.getById('task-1')).toThrow(SyntaxError);
    expect(getLogsByLevel('error')).toMatchObject([
      { msg: 'Stored record is not valid JSON', table: 'tasks', id: 'task-1' },
    ]);

    db.close();
  });

  it('should reject a stored record that fails validation', () => {
    const db = new Database(':memory:');
    const tasks = new SqliteRepository(db, 'tasks', Task);
    db.prepare('INSERT INTO tasks (id, data) VALUES (?, ?)').run(
      'task-1',
      JSON.stringify({ id: 'task-1', title: '' }),
    );

    expect(() => tasks.getAll()).toThrow(ValidationError);

    db.close();
  });
});
