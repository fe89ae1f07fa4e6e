/**
 * Builds the task context for the current working directory.
 */

import { ApplicationController } from './applications.js';
import { createLogger } from './logger.js';
import { findProjectRoot, loadProject } from './project.js';
import { FileModuleLoader } from './registry.js';
import { consoleShell } from './shell.js';
import type { TaskContext } from './repo-helpers.js';

export function createTaskContext(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): TaskContext {
  const project = loadProject(findProjectRoot(cwd), env);
  const logger = createLogger(env);
  return {
    project,
    loader: new FileModuleLoader(project.root, project.repoModules),
    applications: new ApplicationController(logger),
    logger,
    shell: consoleShell,
    env,
  };
}
