/**
 * Task - a unit of work with a status lifecycle, priority, comments and tags.
 *
 * Status transitions are unrestricted except that `done` is terminal.
 * Every successful mutation refreshes `updatedAt`.
 */

import {
  commentContentSchema,
  tagSchema,
  taskRecordSchema,
  taskTitleSchema,
} from '@worklane/types';
import type { TaskPriority, TaskRecord, TaskStatus } from '@worklane/types';
import { TASK_STATUS_PROGRESS, TIME } from '../constants.ts';
import { InvalidTransitionError, ValidationError } from '../types/errors.ts';
import { generateId } from '../utils/generateId.ts';
import { parseWith } from '../utils/validation.ts';
import type { Entity } from './types.ts';

export type TaskComment = {
  readonly id: string;
  readonly authorId: string;
  readonly content: string;
  readonly createdAt: Date;
};

/** Options for creating a new task */
export type NewTaskOptions = {
  title: string;
  description?: string;
  assigneeId?: string | null;
  priority?: TaskPriority;
  dueDate?: Date | null;
  tags?: ReadonlyArray<string>;
};

type TaskState = {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  priority: TaskPriority;
  assigneeId: string | null;
  dueDate: Date | null;
  comments: TaskComment[];
  tags: string[];
  createdAt: Date;
  updatedAt: Date;
};

export class Task implements Entity<TaskRecord> {
  private readonly _id: string;
  private _title: string;
  private _description: string;
  private _status: TaskStatus;
  private _priority: TaskPriority;
  private _assigneeId: string | null;
  private _dueDate: Date | null;
  private readonly _comments: TaskComment[];
  private readonly _tags: string[];
  private readonly _createdAt: Date;
  private _updatedAt: Date;

  private constructor(state: TaskState) {
    this._id = state.id;
    this._title = state.title;
    this._description = state.description;
    this._status = state.status;
    this._priority = state.priority;
    this._assigneeId = state.assigneeId;
    this._dueDate = state.dueDate;
    this._comments = state.comments;
    this._tags = state.tags;
    this._createdAt = state.createdAt;
    this._updatedAt = state.updatedAt;
  }

  /**
   * Create a new task in the `todo` status.
   * @throws ValidationError when the title is blank
   */
  static create(options: NewTaskOptions): Task {
    const now = new Date();
    const task = new Task({
      id: generateId(),
      title: parseWith(taskTitleSchema, options.title),
      description: options.description ?? '',
      status: 'todo',
      priority: options.priority ?? 'medium',
      assigneeId: options.assigneeId ?? null,
      dueDate: options.dueDate ? new Date(options.dueDate.getTime()) : null,
      comments: [],
      tags: [],
      createdAt: now,
      updatedAt: now,
    });

    for (const tag of options.tags ?? []) {
      task.insertTag(tag);
    }

    return task;
  }

  /**
   * Rebuild a task from its serialized record.
   * @throws ValidationError when the record is malformed
   */
  static fromRecord(record: unknown): Task {
    const data = parseWith(taskRecordSchema, record);

    return new Task({
      id: data.id,
      title: data.title,
      description: data.description,
      status: data.status,
      priority: data.priority,
      assigneeId: data.assigneeId,
      dueDate: data.dueDate ? new Date(data.dueDate) : null,
      comments: data.comments.map((comment) => ({
        id: comment.id,
        authorId: comment.authorId,
        content: comment.content,
        createdAt: new Date(comment.createdAt),
      })),
      tags: [...data.tags],
      createdAt: new Date(data.createdAt),
      updatedAt: new Date(data.updatedAt),
    });
  }

  get id(): string {
    return this._id;
  }

  get title(): string {
    return this._title;
  }

  get description(): string {
    return this._description;
  }

  get status(): TaskStatus {
    return this._status;
  }

  get priority(): TaskPriority {
    return this._priority;
  }

  get assigneeId(): string | null {
    return this._assigneeId;
  }

  get dueDate(): Date | null {
    return this._dueDate ? new Date(this._dueDate.getTime()) : null;
  }

  get comments(): ReadonlyArray<TaskComment> {
    return this._comments.map((comment) => ({
      ...comment,
      createdAt: new Date(comment.createdAt.getTime()),
    }));
  }

  get tags(): ReadonlyArray<string> {
    return [...this._tags];
  }

  get createdAt(): Date {
    return new Date(this._createdAt.getTime());
  }

  get updatedAt(): Date {
    return new Date(this._updatedAt.getTime());
  }

  assignId(id: string): void {
    throw new ValidationError(
      `Task ${this._id} already has an ID; cannot reassign to ${id}`,
    );
  }

  rename(title: string): void {
    this._title = parseWith(taskTitleSchema, title);
    this.touch();
  }

  describe(description: string): void {
    this._description = description;
    this.touch();
  }

  setPriority(priority: TaskPriority): void {
    this._priority = priority;
    this.touch();
  }

  setDueDate(dueDate: Date | null): void {
    this._dueDate = dueDate ? new Date(dueDate.getTime()) : null;
    this.touch();
  }

  /** Set or clear the assignee. Existence is checked by the caller. */
  assign(userId: string | null): void {
    this._assigneeId = userId;
    this.touch();
  }

  /**
   * Move the task to a new status.
   * @throws InvalidTransitionError when leaving `done`
   */
  updateStatus(next: TaskStatus): void {
    if (this._status === 'done' && next !== 'done') {
      throw new InvalidTransitionError(
        `Cannot change status of completed task ${this._id} to ${next}`,
      );
    }

    this._status = next;
    this.touch();
  }

  /**
   * Append a comment.
   * @throws ValidationError when the content is blank
   */
  addComment(authorId: string, content: string): TaskComment {
    const comment: TaskComment = {
      id: generateId(),
      authorId,
      content: parseWith(commentContentSchema, content),
      createdAt: new Date(),
    };

    this._comments.push(comment);
    this.touch();
    return { ...comment, createdAt: new Date(comment.createdAt.getTime()) };
  }

  /** Add a normalized tag. Returns false when blank or already present. */
  addTag(tag: string): boolean {
    const added = this.insertTag(tag);
    if (added) {
      this.touch();
    }
    return added;
  }

  /** Remove a normalized tag. Returns false when it was not present. */
  removeTag(tag: string): boolean {
    const normalized = parseWith(tagSchema, tag);
    const index = this._tags.indexOf(normalized);
    if (index === -1) {
      return false;
    }

    this._tags.splice(index, 1);
    this.touch();
    return true;
  }

  hasTag(tag: string): boolean {
    return this._tags.includes(parseWith(tagSchema, tag));
  }

  /** Evaluated against `now` on every call, never cached */
  isOverdue(now: Date = new Date()): boolean {
    if (!this._dueDate || this._status === 'done') {
      return false;
    }
    return now.getTime() > this._dueDate.getTime();
  }

  isUrgent(now: Date = new Date()): boolean {
    if (this._priority === 'urgent') {
      return true;
    }

    if (this._dueDate && this._priority === 'high') {
      return this._dueDate.getTime() - now.getTime() <= TIME.ONE_DAY_MS;
    }

    return false;
  }

  /** Progress implied by the status alone */
  getProgressPercentage(): number {
    return TASK_STATUS_PROGRESS[this._status];
  }

  toRecord(): TaskRecord {
    return {
      id: this._id,
      title: this._title,
      description: this._description,
      status: this._status,
      priority: this._priority,
      assigneeId: this._assigneeId,
      dueDate: this._dueDate ? this._dueDate.toISOString() : null,
      comments: this._comments.map((comment) => ({
        id: comment.id,
        authorId: comment.authorId,
        content: comment.content,
        createdAt: comment.createdAt.toISOString(),
      })),
      tags: [...this._tags],
      createdAt: this._createdAt.toISOString(),
      updatedAt: this._updatedAt.toISOString(),
    };
  }

  toString(): string {
    return `Task(${this._title}, ${this._status})`;
  }

  private insertTag(tag: string): boolean {
    const normalized = parseWith(tagSchema, tag);
    if (!normalized || this._tags.includes(normalized)) {
      return false;
    }
    this._tags.push(normalized);
    return true;
  }

  private touch(): void {
    this._updatedAt = new Date();
  }
}
