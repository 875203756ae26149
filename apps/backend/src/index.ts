/**
 * Worklane backend entry point.
 *
 * Wires the configured storage driver to the domain services.
 */

import { config } from './config/default.ts';
import type { Config } from './config/default.ts';
import { createRepositories } from './repositories/index.ts';
import type { Repositories } from './repositories/index.ts';
import { createServices } from './services/index.ts';
import type { Services } from './services/index.ts';
import { createChildLogger } from './utils/logging/logger.ts';

const appLogger = createChildLogger('worklane');

export type Worklane = {
  repositories: Repositories;
  services: Services;
  /** Release the storage connection */
  close(): void;
};

export function createWorklane(appConfig: Config = config): Worklane {
  const repositories = createRepositories(appConfig);
  const services = createServices(repositories);

  appLogger.info(
    { env: appConfig.env, storage: appConfig.storage.driver },
    'Worklane services ready',
  );

  return {
    repositories,
    services,
    close() {
      repositories.close();
      appLogger.debug('Storage closed');
    },
  };
}

export { config, loadConfig } from './config/default.ts';
export type { Config, Environment, StorageDriver } from './config/default.ts';
export * from './models/index.ts';
export * from './policies/index.ts';
export * from './repositories/index.ts';
export * from './services/index.ts';
export * from './types/index.ts';
export { createChildLogger, logger } from './utils/logging/index.ts';
