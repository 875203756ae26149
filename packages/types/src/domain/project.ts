/**
 * Project Domain Types
 *
 * Projects group tasks by reference, track milestones and keep a roster of
 * contributing users.
 */

import type { TaskStatus } from './task.js';

/** Project statuses (transitions are unrestricted) */
export type ProjectStatus =
  | 'planning'
  | 'active'
  | 'on_hold'
  | 'completed'
  | 'cancelled';

/** All project statuses */
export const PROJECT_STATUSES: ReadonlyArray<ProjectStatus> = [
  'planning',
  'active',
  'on_hold',
  'completed',
  'cancelled',
];

/** Serialized milestone */
export type MilestoneRecord = {
  id: string;
  title: string;
  description: string;
  /** ISO due date */
  dueDate: string;
  completed: boolean;
  /** ISO timestamp set when the milestone is completed */
  completedAt: string | null;
};

/** Serialized project as persisted by a repository */
export type ProjectRecord = {
  id: string;
  name: string;
  description: string;
  status: ProjectStatus;
  /** Owning user ID (weak reference) */
  ownerId: string | null;
  /** Task IDs in insertion order (weak references) */
  taskIds: Array<string>;
  milestones: Array<MilestoneRecord>;
  /** User IDs allowed to modify the project */
  teamMembers: Array<string>;
  createdAt: string;
  updatedAt: string;
};

/** Per-project task counts */
export type ProjectTaskStatistics = Record<TaskStatus, number> & {
  total: number;
  overdue: number;
  urgent: number;
};

/** Detailed progress report for a single project */
export type ProjectProgress = {
  projectId: string;
  name: string;
  status: ProjectStatus;
  /** floor(100 * done / total), 0 without tasks */
  progressPercentage: number;
  taskStatistics: ProjectTaskStatistics;
  overdueTasks: number;
  urgentTasks: number;
  milestones: {
    total: number;
    completed: number;
    pending: number;
  };
  teamSize: number;
};

/** Aggregate project counts computed over a collection scan */
export type ProjectStatistics = {
  total: number;
  byStatus: Record<ProjectStatus, number>;
  totalTasks: number;
  totalMilestones: number;
  /** Projects with at least one overdue task */
  overdueProjects: number;
};
