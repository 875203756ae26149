/**
 * Services Module
 *
 * Builds the four domain services over one set of repositories.
 */

import type { Repositories } from '../repositories/index.ts';
import { ProjectService } from './projectService.ts';
import { TaskService } from './taskService.ts';
import { TeamService } from './teamService.ts';
import { UserService } from './userService.ts';

export type Services = {
  users: UserService;
  tasks: TaskService;
  projects: ProjectService;
  teams: TeamService;
};

export function createServices(repositories: Repositories): Services {
  return {
    users: new UserService(repositories),
    tasks: new TaskService(repositories),
    projects: new ProjectService(repositories),
    teams: new TeamService(repositories),
  };
}

export { ProjectService, TaskService, TeamService, UserService };
export type { UserDataCandidate, UserDataErrors } from './userService.ts';
