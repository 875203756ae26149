/**
 * Project - references tasks by ID, tracks milestones and a roster of
 * contributing users.
 *
 * Task data lives in the task repository; the project only keeps IDs.
 * Methods that derive progress or statistics take the resolved task list
 * and ignore tasks the project does not reference.
 */

import {
  milestoneTitleSchema,
  projectNameSchema,
  projectRecordSchema,
} from '@worklane/types';
import type {
  ProjectRecord,
  ProjectStatus,
  ProjectTaskStatistics,
  TaskStatus,
} from '@worklane/types';
import { ValidationError } from '../types/errors.ts';
import { generateId } from '../utils/generateId.ts';
import { parseWith } from '../utils/validation.ts';
import type { Task } from './Task.ts';
import type { Entity } from './types.ts';

export type Milestone = {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly dueDate: Date;
  readonly completed: boolean;
  readonly completedAt: Date | null;
};

/** Options for creating a new project */
export type NewProjectOptions = {
  name: string;
  description?: string;
  ownerId?: string | null;
};

type MutableMilestone = {
  -readonly [K in keyof Milestone]: Milestone[K];
};

type ProjectState = {
  id: string;
  name: string;
  description: string;
  status: ProjectStatus;
  ownerId: string | null;
  taskIds: string[];
  milestones: MutableMilestone[];
  teamMembers: string[];
  createdAt: Date;
  updatedAt: Date;
};

function copyMilestone(milestone: MutableMilestone): Milestone {
  return {
    ...milestone,
    dueDate: new Date(milestone.dueDate.getTime()),
    completedAt: milestone.completedAt
      ? new Date(milestone.completedAt.getTime())
      : null,
  };
}

export class Project implements Entity<ProjectRecord> {
  private readonly _id: string;
  private _name: string;
  private _description: string;
  private _status: ProjectStatus;
  private _ownerId: string | null;
  private readonly _taskIds: string[];
  private readonly _milestones: MutableMilestone[];
  private readonly _teamMembers: string[];
  private readonly _createdAt: Date;
  private _updatedAt: Date;

  private constructor(state: ProjectState) {
    this._id = state.id;
    this._name = state.name;
    this._description = state.description;
    this._status = state.status;
    this._ownerId = state.ownerId;
    this._taskIds = state.taskIds;
    this._milestones = state.milestones;
    this._teamMembers = state.teamMembers;
    this._createdAt = state.createdAt;
    this._updatedAt = state.updatedAt;
  }

  /**
   * Create a new project in the `planning` status.
   * @throws ValidationError when the name is blank
   */
  static create(options: NewProjectOptions): Project {
    const now = new Date();
    return new Project({
      id: generateId(),
      name: parseWith(projectNameSchema, options.name),
      description: options.description ?? '',
      status: 'planning',
      ownerId: options.ownerId ?? null,
      taskIds: [],
      milestones: [],
      teamMembers: [],
      createdAt: now,
      updatedAt: now,
    });
  }

  /**
   * Rebuild a project from its serialized record.
   * @throws ValidationError when the record is malformed
   */
  static fromRecord(record: unknown): Project {
    const data = parseWith(projectRecordSchema, record);

    return new Project({
      id: data.id,
      name: data.name,
      description: data.description,
      status: data.status,
      ownerId: data.ownerId,
      taskIds: [...data.taskIds],
      milestones: data.milestones.map((milestone) => ({
        id: milestone.id,
        title: milestone.title,
        description: milestone.description,
        dueDate: new Date(milestone.dueDate),
        completed: milestone.completed,
        completedAt: milestone.completedAt
          ? new Date(milestone.completedAt)
          : null,
      })),
      teamMembers: [...data.teamMembers],
      createdAt: new Date(data.createdAt),
      updatedAt: new Date(data.updatedAt),
    });
  }

  get id(): string {
    return this._id;
  }

  get name(): string {
    return this._name;
  }

  get description(): string {
    return this._description;
  }

  get status(): ProjectStatus {
    return this._status;
  }

  get ownerId(): string | null {
    return this._ownerId;
  }

  get taskIds(): ReadonlyArray<string> {
    return [...this._taskIds];
  }

  get milestones(): ReadonlyArray<Milestone> {
    return this._milestones.map(copyMilestone);
  }

  get teamMembers(): ReadonlyArray<string> {
    return [...this._teamMembers];
  }

  get createdAt(): Date {
    return new Date(this._createdAt.getTime());
  }

  get updatedAt(): Date {
    return new Date(this._updatedAt.getTime());
  }

  assignId(id: string): void {
    throw new ValidationError(
      `Project ${this._id} already has an ID; cannot reassign to ${id}`,
    );
  }

  rename(name: string): void {
    this._name = parseWith(projectNameSchema, name);
    this.touch();
  }

  describe(description: string): void {
    this._description = description;
    this.touch();
  }

  /** Project statuses transition freely */
  updateStatus(status: ProjectStatus): void {
    this._status = status;
    this.touch();
  }

  setOwner(userId: string | null): void {
    this._ownerId = userId;
    this.touch();
  }

  /** Reference a task. Returns false when already referenced. */
  addTask(taskId: string): boolean {
    if (this._taskIds.includes(taskId)) {
      return false;
    }
    this._taskIds.push(taskId);
    this.touch();
    return true;
  }

  /** Drop a task reference. Returns false when it was not referenced. */
  removeTask(taskId: string): boolean {
    const index = this._taskIds.indexOf(taskId);
    if (index === -1) {
      return false;
    }
    this._taskIds.splice(index, 1);
    this.touch();
    return true;
  }

  hasTask(taskId: string): boolean {
    return this._taskIds.includes(taskId);
  }

  /**
   * Add a milestone.
   * @throws ValidationError when the title is blank
   */
  addMilestone(title: string, description: string, dueDate: Date): Milestone {
    const milestone: MutableMilestone = {
      id: generateId(),
      title: parseWith(milestoneTitleSchema, title),
      description: description.trim(),
      dueDate: new Date(dueDate.getTime()),
      completed: false,
      completedAt: null,
    };

    this._milestones.push(milestone);
    this.touch();
    return copyMilestone(milestone);
  }

  /** Mark a milestone completed. Returns false for an unknown ID. */
  completeMilestone(milestoneId: string): boolean {
    const milestone = this._milestones.find((m) => m.id === milestoneId);
    if (!milestone) {
      return false;
    }

    const now = new Date();
    milestone.completed = true;
    milestone.completedAt = now;
    this._updatedAt = now;
    return true;
  }

  /** Add a user to the roster. Returns false when already present. */
  addTeamMember(userId: string): boolean {
    if (this._teamMembers.includes(userId)) {
      return false;
    }
    this._teamMembers.push(userId);
    this.touch();
    return true;
  }

  /** Remove a user from the roster. Returns false when absent. */
  removeTeamMember(userId: string): boolean {
    const index = this._teamMembers.indexOf(userId);
    if (index === -1) {
      return false;
    }
    this._teamMembers.splice(index, 1);
    this.touch();
    return true;
  }

  isTeamMember(userId: string): boolean {
    return this._teamMembers.includes(userId);
  }

  /**
   * The subset of `tasks` this project references, in project order,
   * without duplicates.
   */
  selectOwnTasks(tasks: ReadonlyArray<Task>): Task[] {
    const byId = new Map<string, Task>();
    for (const task of tasks) {
      byId.set(task.id, task);
    }

    const owned: Task[] = [];
    for (const taskId of this._taskIds) {
      const task = byId.get(taskId);
      if (task) {
        owned.push(task);
      }
    }
    return owned;
  }

  getTasksByStatus(tasks: ReadonlyArray<Task>, status: TaskStatus): Task[] {
    return this.selectOwnTasks(tasks).filter((task) => task.status === status);
  }

  /** floor(100 * done / total); 0 when the project has no tasks */
  getProgressPercentage(tasks: ReadonlyArray<Task>): number {
    const owned = this.selectOwnTasks(tasks);
    if (owned.length === 0) {
      return 0;
    }

    const done = owned.filter((task) => task.status === 'done').length;
    return Math.floor((done * 100) / owned.length);
  }

  getOverdueTasks(tasks: ReadonlyArray<Task>, now: Date = new Date()): Task[] {
    return this.selectOwnTasks(tasks).filter((task) => task.isOverdue(now));
  }

  getUrgentTasks(tasks: ReadonlyArray<Task>, now: Date = new Date()): Task[] {
    return this.selectOwnTasks(tasks).filter((task) => task.isUrgent(now));
  }

  getTaskStatistics(
    tasks: ReadonlyArray<Task>,
    now: Date = new Date(),
  ): ProjectTaskStatistics {
    const owned = this.selectOwnTasks(tasks);
    const countStatus = (status: TaskStatus): number =>
      owned.filter((task) => task.status === status).length;

    return {
      total: owned.length,
      todo: countStatus('todo'),
      in_progress: countStatus('in_progress'),
      review: countStatus('review'),
      done: countStatus('done'),
      cancelled: countStatus('cancelled'),
      overdue: owned.filter((task) => task.isOverdue(now)).length,
      urgent: owned.filter((task) => task.isUrgent(now)).length,
    };
  }

  toRecord(): ProjectRecord {
    return {
      id: this._id,
      name: this._name,
      description: this._description,
      status: this._status,
      ownerId: this._ownerId,
      taskIds: [...this._taskIds],
      milestones: this._milestones.map((milestone) => ({
        id: milestone.id,
        title: milestone.title,
        description: milestone.description,
        dueDate: milestone.dueDate.toISOString(),
        completed: milestone.completed,
        completedAt: milestone.completedAt
          ? milestone.completedAt.toISOString()
          : null,
      })),
      teamMembers: [...this._teamMembers],
      createdAt: this._createdAt.toISOString(),
      updatedAt: this._updatedAt.toISOString(),
    };
  }

  toString(): string {
    return `Project(${this._name}, ${this._status})`;
  }

  private touch(): void {
    this._updatedAt = new Date();
  }
}
