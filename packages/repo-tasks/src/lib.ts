export * from './types.js';
export * from './utils/repo-helpers.js';
export { TaskError, describeError } from './utils/errors.js';
export { ApplicationController, FRAMEWORK_APP, type ApplicationSpec } from './utils/applications.js';
export { Logger, createLogger, consoleBackend, CONSOLE_BACKEND, type LogBackend, type LogLevel } from './utils/logger.js';
export { FileProject, loadProject, findProjectRoot, parseProjectFile, type Project, type ProjectFile } from './utils/project.js';
export { ModuleRegistry, FileModuleLoader } from './utils/registry.js';
export { consoleShell, type Shell } from './utils/shell.js';
export { createTaskContext } from './utils/context.js';
