/**
 * Task Domain Types
 *
 * A task is the unit of work tracked by Worklane. Status moves through a
 * small lifecycle where `done` is terminal.
 */

/** Task lifecycle statuses */
export type TaskStatus = 'todo' | 'in_progress' | 'review' | 'done' | 'cancelled';

/** Task priorities, lowest first */
export type TaskPriority = 'low' | 'medium' | 'high' | 'urgent';

/** All task statuses in lifecycle order */
export const TASK_STATUSES: ReadonlyArray<TaskStatus> = [
  'todo',
  'in_progress',
  'review',
  'done',
  'cancelled',
];

/** All task priorities in ascending order */
export const TASK_PRIORITIES: ReadonlyArray<TaskPriority> = [
  'low',
  'medium',
  'high',
  'urgent',
];

/** Comment left on a task */
export type TaskCommentRecord = {
  /** Unique comment ID */
  id: string;
  /** User ID of the author (weak reference) */
  authorId: string;
  /** Trimmed, non-empty comment body */
  content: string;
  /** ISO timestamp of creation */
  createdAt: string;
};

/** Serialized task as persisted by a repository */
export type TaskRecord = {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  priority: TaskPriority;
  /** Assigned user ID (weak reference) */
  assigneeId: string | null;
  /** ISO due date */
  dueDate: string | null;
  comments: Array<TaskCommentRecord>;
  /** Lower-cased, deduplicated tags */
  tags: Array<string>;
  createdAt: string;
  updatedAt: string;
};

/** Aggregate task counts computed over a collection scan */
export type TaskStatistics = {
  total: number;
  byStatus: Record<TaskStatus, number>;
  byPriority: Record<TaskPriority, number>;
  overdue: number;
  urgent: number;
};
