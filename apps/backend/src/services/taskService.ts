/**
 * Task Service - task lifecycle, assignment, comments and tags.
 *
 * Features:
 * - Cross-reference checks for assignees, creators and acting users
 * - Assignee self-service; assignment and deletion reserved for admins
 * - Deleting a task detaches it from every project that references it
 * - Search and statistics computed from full scans at query time
 */
import type { Logger } from 'pino';
import {
  createTaskSchema,
  taskSearchSchema,
  updateTaskDetailsSchema,
} from '@worklane/types';
import type {
  CreateTaskInput,
  TaskPriority,
  TaskSearchFilter,
  TaskStatistics,
  TaskStatus,
  UpdateTaskDetailsInput,
} from '@worklane/types';
import { Task } from '../models/index.ts';
import type { TaskComment, User } from '../models/index.ts';
import {
  canAssignTask,
  canCommentOnTask,
  canDeleteTask,
  canModifyTask,
} from '../policies/index.ts';
import type { Repositories } from '../repositories/index.ts';
import { PermissionDeniedError } from '../types/errors.ts';
import { createChildLogger } from '../utils/logging/logger.ts';
import { parseWith } from '../utils/validation.ts';
import {
  logServiceFailure,
  matchesQuery,
  requireEntity,
} from './serviceSupport.ts';

// Module-level logger; public methods accept a logger for request-scoped logging
const moduleLogger = createChildLogger('task-service');

class TaskService {
  constructor(private readonly repositories: Repositories) {}

  private get tasks() {
    return this.repositories.tasks;
  }

  /**
   * Create a task in the `todo` status.
   * @throws NotFoundError when the assignee or creator does not exist
   */
  createTask(
    input: CreateTaskInput,
    creatorId?: string,
    logger: Logger = moduleLogger,
  ): Task {
    try {
      const data = parseWith(createTaskSchema, input);
      logger.info(
        { action: 'createTask', title: data.title, creatorId },
        'Creating task',
      );

      if (data.assigneeId) {
        requireEntity(this.repositories.users, 'User', data.assigneeId, 'Assignee');
      }
      if (creatorId) {
        requireEntity(this.repositories.users, 'User', creatorId, 'Creator');
      }

      const task = Task.create(data);
      this.repositories.runInTransaction(() => this.tasks.save(task));

      logger.info(
        { action: 'createTask', taskId: task.id, assigneeId: task.assigneeId },
        'Task created',
      );
      return task;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'createTask', creatorId },
        error,
        'Failed to create task',
      );
      throw error;
    }
  }

  getTask(taskId: string): Task | null {
    return this.tasks.getById(taskId);
  }

  /**
   * Move a task to a new status. The modify policy applies only when an
   * acting user is given.
   * @throws InvalidTransitionError when the task is already `done`
   */
  updateTaskStatus(
    taskId: string,
    status: TaskStatus,
    actorId?: string,
    logger: Logger = moduleLogger,
  ): Task {
    try {
      const task = requireEntity(this.tasks, 'Task', taskId);
      if (actorId) {
        const actor = this.requireActor(actorId);
        if (!canModifyTask(actor, task)) {
          throw new PermissionDeniedError(
            `User ${actorId} does not have permission to modify task ${taskId}`,
          );
        }
      }

      const previous = task.status;
      task.updateStatus(status);
      this.repositories.runInTransaction(() => this.tasks.save(task));

      logger.info(
        { action: 'updateTaskStatus', taskId, from: previous, to: status },
        'Task status updated',
      );
      return task;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'updateTaskStatus', taskId, status, actorId },
        error,
        'Failed to update task status',
      );
      throw error;
    }
  }

  /**
   * Change title, description, priority or due date. `dueDate: null`
   * clears the due date.
   */
  updateTaskDetails(
    taskId: string,
    changes: UpdateTaskDetailsInput,
    actorId: string,
    logger: Logger = moduleLogger,
  ): Task {
    try {
      const data = parseWith(updateTaskDetailsSchema, changes);
      const task = this.requireModifiable(taskId, actorId);

      if (data.title !== undefined) {
        task.rename(data.title);
      }
      if (data.description !== undefined) {
        task.describe(data.description);
      }
      if (data.priority !== undefined) {
        task.setPriority(data.priority);
      }
      if (data.dueDate !== undefined) {
        task.setDueDate(data.dueDate);
      }
      this.repositories.runInTransaction(() => this.tasks.save(task));

      logger.info(
        { action: 'updateTaskDetails', taskId, fields: Object.keys(data) },
        'Task details updated',
      );
      return task;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'updateTaskDetails', taskId, actorId },
        error,
        'Failed to update task details',
      );
      throw error;
    }
  }

  /**
   * @throws PermissionDeniedError unless the assigner is an admin
   */
  assignTask(
    taskId: string,
    assigneeId: string,
    assignerId: string,
    logger: Logger = moduleLogger,
  ): Task {
    try {
      const task = requireEntity(this.tasks, 'Task', taskId);
      requireEntity(this.repositories.users, 'User', assigneeId, 'Assignee');
      const assigner = this.requireActor(assignerId);

      if (!canAssignTask(assigner, task)) {
        throw new PermissionDeniedError(
          `User ${assignerId} does not have permission to assign tasks`,
        );
      }

      task.assign(assigneeId);
      this.repositories.runInTransaction(() => this.tasks.save(task));

      logger.info(
        { action: 'assignTask', taskId, assigneeId, assignerId },
        'Task assigned',
      );
      return task;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'assignTask', taskId, assigneeId, assignerId },
        error,
        'Failed to assign task',
      );
      throw error;
    }
  }

  unassignTask(
    taskId: string,
    actorId: string,
    logger: Logger = moduleLogger,
  ): Task {
    try {
      const task = requireEntity(this.tasks, 'Task', taskId);
      const actor = this.requireActor(actorId);

      if (!canAssignTask(actor, task)) {
        throw new PermissionDeniedError(
          `User ${actorId} does not have permission to unassign tasks`,
        );
      }

      task.assign(null);
      this.repositories.runInTransaction(() => this.tasks.save(task));

      logger.info({ action: 'unassignTask', taskId, actorId }, 'Task unassigned');
      return task;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'unassignTask', taskId, actorId },
        error,
        'Failed to unassign task',
      );
      throw error;
    }
  }

  addTaskComment(
    taskId: string,
    authorId: string,
    content: string,
    logger: Logger = moduleLogger,
  ): TaskComment {
    try {
      const task = requireEntity(this.tasks, 'Task', taskId);
      const author = requireEntity(
        this.repositories.users,
        'User',
        authorId,
        'Author',
      );

      if (!canCommentOnTask(author, task)) {
        throw new PermissionDeniedError(
          `User ${authorId} does not have permission to comment on task ${taskId}`,
        );
      }

      const comment = task.addComment(authorId, content);
      this.repositories.runInTransaction(() => this.tasks.save(task));

      logger.info(
        { action: 'addTaskComment', taskId, commentId: comment.id },
        'Comment added',
      );
      return comment;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'addTaskComment', taskId, authorId },
        error,
        'Failed to add comment',
      );
      throw error;
    }
  }

  /** Tags are normalized; an existing or blank tag leaves the task untouched */
  addTaskTag(
    taskId: string,
    tag: string,
    actorId: string,
    logger: Logger = moduleLogger,
  ): Task {
    try {
      const task = this.requireModifiable(taskId, actorId);
      if (task.addTag(tag)) {
        this.repositories.runInTransaction(() => this.tasks.save(task));
        logger.info({ action: 'addTaskTag', taskId, tag }, 'Tag added');
      }
      return task;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'addTaskTag', taskId, tag, actorId },
        error,
        'Failed to add tag',
      );
      throw error;
    }
  }

  removeTaskTag(
    taskId: string,
    tag: string,
    actorId: string,
    logger: Logger = moduleLogger,
  ): Task {
    try {
      const task = this.requireModifiable(taskId, actorId);
      if (task.removeTag(tag)) {
        this.repositories.runInTransaction(() => this.tasks.save(task));
        logger.info({ action: 'removeTaskTag', taskId, tag }, 'Tag removed');
      }
      return task;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'removeTaskTag', taskId, tag, actorId },
        error,
        'Failed to remove tag',
      );
      throw error;
    }
  }

  /**
   * Delete a task and drop it from every project that references it.
   * @throws PermissionDeniedError unless the actor is an admin
   */
  deleteTask(
    taskId: string,
    actorId: string,
    logger: Logger = moduleLogger,
  ): boolean {
    try {
      const task = requireEntity(this.tasks, 'Task', taskId);
      const actor = this.requireActor(actorId);

      if (!canDeleteTask(actor, task)) {
        throw new PermissionDeniedError(
          `User ${actorId} does not have permission to delete tasks`,
        );
      }

      const detachedFrom = this.repositories.runInTransaction(() => {
        const projectIds: string[] = [];
        for (const project of this.repositories.projects.getAll()) {
          if (project.removeTask(taskId)) {
            this.repositories.projects.save(project);
            projectIds.push(project.id);
          }
        }
        this.tasks.delete(taskId);
        return projectIds;
      });

      logger.info(
        { action: 'deleteTask', taskId, actorId, detachedFrom },
        'Task deleted',
      );
      return true;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'deleteTask', taskId, actorId },
        error,
        'Failed to delete task',
      );
      throw error;
    }
  }

  /**
   * Tasks assigned to a user, optionally in one status.
   * @throws NotFoundError for an unknown user
   */
  getUserTasks(userId: string, status?: TaskStatus): Task[] {
    requireEntity(this.repositories.users, 'User', userId);
    return this.tasks
      .getAll()
      .filter(
        (task) =>
          task.assigneeId === userId && (!status || task.status === status),
      );
  }

  getOverdueTasks(userId?: string, now: Date = new Date()): Task[] {
    return this.tasksFor(userId).filter((task) => task.isOverdue(now));
  }

  getUrgentTasks(userId?: string, now: Date = new Date()): Task[] {
    return this.tasksFor(userId).filter((task) => task.isUrgent(now));
  }

  /** Text match on title or description, narrowed by the optional filters */
  searchTasks(filter: TaskSearchFilter): Task[] {
    const { query, status, priority, assigneeId, tag } = parseWith(
      taskSearchSchema,
      filter,
    );

    return this.tasks.getAll().filter((task) => {
      if (!matchesQuery(query, task.title, task.description)) return false;
      if (status && task.status !== status) return false;
      if (priority && task.priority !== priority) return false;
      if (assigneeId && task.assigneeId !== assigneeId) return false;
      if (tag && !task.hasTag(tag)) return false;
      return true;
    });
  }

  getTaskStatistics(userId?: string, now: Date = new Date()): TaskStatistics {
    const tasks = this.tasksFor(userId);

    const byStatus: Record<TaskStatus, number> = {
      todo: 0,
      in_progress: 0,
      review: 0,
      done: 0,
      cancelled: 0,
    };
    const byPriority: Record<TaskPriority, number> = {
      low: 0,
      medium: 0,
      high: 0,
      urgent: 0,
    };
    for (const task of tasks) {
      byStatus[task.status] += 1;
      byPriority[task.priority] += 1;
    }

    return {
      total: tasks.length,
      byStatus,
      byPriority,
      overdue: tasks.filter((task) => task.isOverdue(now)).length,
      urgent: tasks.filter((task) => task.isUrgent(now)).length,
    };
  }

  private tasksFor(userId: string | undefined): Task[] {
    const tasks = this.tasks.getAll();
    return userId ? tasks.filter((task) => task.assigneeId === userId) : tasks;
  }

  private requireActor(actorId: string): User {
    return requireEntity(this.repositories.users, 'User', actorId, 'Acting user');
  }

  private requireModifiable(taskId: string, actorId: string): Task {
    const task = requireEntity(this.tasks, 'Task', taskId);
    const actor = this.requireActor(actorId);
    if (!canModifyTask(actor, task)) {
      throw new PermissionDeniedError(
        `User ${actorId} does not have permission to modify task ${taskId}`,
      );
    }
    return task;
  }
}

export { TaskService };
