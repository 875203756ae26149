/**
 * Project Service - projects, their task references, milestones and roster.
 *
 * Projects hold task IDs only; task data is always resolved from the task
 * repository, so progress reflects the latest committed task state.
 */
import type { Logger } from 'pino';
import {
  addMilestoneSchema,
  createProjectSchema,
  projectSearchSchema,
} from '@worklane/types';
import type {
  AddMilestoneInput,
  CreateProjectInput,
  ProjectProgress,
  ProjectSearchFilter,
  ProjectStatistics,
  ProjectStatus,
  TaskStatus,
} from '@worklane/types';
import { Project } from '../models/index.ts';
import type { Milestone, Task, User } from '../models/index.ts';
import { canModifyProject } from '../policies/index.ts';
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
const moduleLogger = createChildLogger('project-service');

/** Outcome of a single project mutation; unchanged projects are not saved */
type ProjectChange<TResult> = {
  changed: boolean;
  value: TResult;
};

class ProjectService {
  constructor(private readonly repositories: Repositories) {}

  private get projects() {
    return this.repositories.projects;
  }

  /**
   * Create a project in the `planning` status.
   * @throws NotFoundError when the owner does not exist
   */
  createProject(
    input: CreateProjectInput,
    logger: Logger = moduleLogger,
  ): Project {
    try {
      const data = parseWith(createProjectSchema, input);
      logger.info(
        { action: 'createProject', name: data.name, ownerId: data.ownerId },
        'Creating project',
      );

      if (data.ownerId) {
        requireEntity(this.repositories.users, 'User', data.ownerId, 'Owner');
      }

      const project = Project.create(data);
      this.repositories.runInTransaction(() => this.projects.save(project));

      logger.info(
        { action: 'createProject', projectId: project.id },
        'Project created',
      );
      return project;
    } catch (error) {
      logServiceFailure(
        logger,
        { action: 'createProject', ownerId: input.ownerId },
        error,
        'Failed to create project',
      );
      throw error;
    }
  }

  getProject(projectId: string): Project | null {
    return this.projects.getById(projectId);
  }

  updateProjectStatus(
    projectId: string,
    status: ProjectStatus,
    actorId: string,
    logger: Logger = moduleLogger,
  ): Project {
    return this.mutate(
      'updateProjectStatus',
      projectId,
      actorId,
      logger,
      (project) => {
        project.updateStatus(status);
        return { changed: true, value: project };
      },
      { status },
    );
  }

  /**
   * Reference an existing task. Adding a task twice is a no-op.
   * @throws NotFoundError when the task does not exist
   */
  addTaskToProject(
    projectId: string,
    taskId: string,
    actorId: string,
    logger: Logger = moduleLogger,
  ): Project {
    return this.mutate(
      'addTaskToProject',
      projectId,
      actorId,
      logger,
      (project) => ({ changed: project.addTask(taskId), value: project }),
      { taskId },
      () => requireEntity(this.repositories.tasks, 'Task', taskId),
    );
  }

  removeTaskFromProject(
    projectId: string,
    taskId: string,
    actorId: string,
    logger: Logger = moduleLogger,
  ): Project {
    return this.mutate(
      'removeTaskFromProject',
      projectId,
      actorId,
      logger,
      (project) => ({ changed: project.removeTask(taskId), value: project }),
      { taskId },
    );
  }

  addMilestone(
    projectId: string,
    input: AddMilestoneInput,
    actorId: string,
    logger: Logger = moduleLogger,
  ): Milestone {
    return this.mutate(
      'addMilestone',
      projectId,
      actorId,
      logger,
      (project) => {
        const data = parseWith(addMilestoneSchema, input);
        const milestone = project.addMilestone(
          data.title,
          data.description ?? '',
          data.dueDate,
        );
        return { changed: true, value: milestone };
      },
      { title: input.title },
    );
  }

  /** Returns false when the milestone ID is unknown */
  completeMilestone(
    projectId: string,
    milestoneId: string,
    actorId: string,
    logger: Logger = moduleLogger,
  ): boolean {
    return this.mutate(
      'completeMilestone',
      projectId,
      actorId,
      logger,
      (project) => {
        const completed = project.completeMilestone(milestoneId);
        return { changed: completed, value: completed };
      },
      { milestoneId },
    );
  }

  /**
   * @throws NotFoundError when the user does not exist
   */
  addTeamMember(
    projectId: string,
    userId: string,
    actorId: string,
    logger: Logger = moduleLogger,
  ): Project {
    return this.mutate(
      'addTeamMember',
      projectId,
      actorId,
      logger,
      (project) => ({
        changed: project.addTeamMember(userId),
        value: project,
      }),
      { userId },
      () => requireEntity(this.repositories.users, 'User', userId),
    );
  }

  removeTeamMember(
    projectId: string,
    userId: string,
    actorId: string,
    logger: Logger = moduleLogger,
  ): Project {
    return this.mutate(
      'removeTeamMember',
      projectId,
      actorId,
      logger,
      (project) => ({
        changed: project.removeTeamMember(userId),
        value: project,
      }),
      { userId },
    );
  }

  /**
   * Projects the user owns or is on the roster of.
   * @throws NotFoundError for an unknown user
   */
  getUserProjects(userId: string, status?: ProjectStatus): Project[] {
    requireEntity(this.repositories.users, 'User', userId);
    return this.projects
      .getAll()
      .filter(
        (project) =>
          (project.ownerId === userId || project.isTeamMember(userId)) &&
          (!status || project.status === status),
      );
  }

  /** Tasks in project order; IDs whose task no longer exists are skipped */
  getProjectTasks(projectId: string, status?: TaskStatus): Task[] {
    const project = requireEntity(this.projects, 'Project', projectId);
    const tasks = this.resolveTasks(project);
    return status ? tasks.filter((task) => task.status === status) : tasks;
  }

  getProjectProgress(
    projectId: string,
    now: Date = new Date(),
  ): ProjectProgress {
    const project = requireEntity(this.projects, 'Project', projectId);
    const tasks = this.resolveTasks(project);
    const milestones = project.milestones;
    const completed = milestones.filter((m) => m.completed).length;

    return {
      projectId,
      name: project.name,
      status: project.status,
      progressPercentage: project.getProgressPercentage(tasks),
      taskStatistics: project.getTaskStatistics(tasks, now),
      overdueTasks: project.getOverdueTasks(tasks, now).length,
      urgentTasks: project.getUrgentTasks(tasks, now).length,
      milestones: {
        total: milestones.length,
        completed,
        pending: milestones.length - completed,
      },
      teamSize: project.teamMembers.length,
    };
  }

  /** Text match on name or description, narrowed by status and owner */
  searchProjects(filter: ProjectSearchFilter): Project[] {
    const { query, status, ownerId } = parseWith(projectSearchSchema, filter);

    return this.projects.getAll().filter((project) => {
      if (!matchesQuery(query, project.name, project.description)) return false;
      if (status && project.status !== status) return false;
      if (ownerId && project.ownerId !== ownerId) return false;
      return true;
    });
  }

  /**
   * Counts over all projects, or over the user's projects when `userId` is
   * given. `totalTasks` counts task references.
   */
  getProjectStatistics(
    userId?: string,
    now: Date = new Date(),
  ): ProjectStatistics {
    const projects = userId
      ? this.getUserProjects(userId)
      : this.projects.getAll();

    const byStatus: Record<ProjectStatus, number> = {
      planning: 0,
      active: 0,
      on_hold: 0,
      completed: 0,
      cancelled: 0,
    };
    let totalTasks = 0;
    let totalMilestones = 0;
    let overdueProjects = 0;

    for (const project of projects) {
      byStatus[project.status] += 1;
      totalTasks += project.taskIds.length;
      totalMilestones += project.milestones.length;
      if (project.getOverdueTasks(this.resolveTasks(project), now).length > 0) {
        overdueProjects += 1;
      }
    }

    return {
      total: projects.length,
      byStatus,
      totalTasks,
      totalMilestones,
      overdueProjects,
    };
  }

  private resolveTasks(project: Project): Task[] {
    const tasks: Task[] = [];
    for (const taskId of project.taskIds) {
      const task = this.repositories.tasks.getById(taskId);
      if (task) {
        tasks.push(task);
      }
    }
    return tasks;
  }

  private requireActor(actorId: string): User {
    return requireEntity(this.repositories.users, 'User', actorId, 'Acting user');
  }

  /**
   * Resolve the project and any referenced entities, authorize, apply
   * `change` and persist when it reports a change.
   */
  private mutate<TResult>(
    action: string,
    projectId: string,
    actorId: string,
    logger: Logger,
    change: (project: Project) => ProjectChange<TResult>,
    context: Record<string, unknown> = {},
    resolveReferences?: () => void,
  ): TResult {
    try {
      const project = requireEntity(this.projects, 'Project', projectId);
      resolveReferences?.();
      const actor = this.requireActor(actorId);

      if (!canModifyProject(actor, project)) {
        throw new PermissionDeniedError(
          `User ${actorId} does not have permission to modify project ${projectId}`,
        );
      }

      const { changed, value } = change(project);
      if (changed) {
        this.repositories.runInTransaction(() => this.projects.save(project));
        logger.info({ action, projectId, actorId, ...context }, 'Project updated');
      } else {
        logger.debug({ action, projectId, actorId, ...context }, 'No change');
      }
      return value;
    } catch (error) {
      logServiceFailure(
        logger,
        { action, projectId, actorId, ...context },
        error,
        `Failed to ${action}`,
      );
      throw error;
    }
  }
}

export { ProjectService };
