/**
 * Host project description, read from project.yaml at the project root.
 */

import * as fs from 'fs';
import * as path from 'path';
import { execSync } from 'child_process';
import * as yaml from 'js-yaml';
import { TaskError } from './errors.js';

const PROJECT_FILE = 'project.yaml';
const DEFAULT_BUILD_PATH = '_build';
const DEFAULT_ENV = 'dev';

/** The project a task runs in */
export interface Project {
  root: string;
  /** Name of the project's own application */
  app: string;
  isUmbrella(): boolean;
  /**
   * Dependency name -> path. Absent when the toolchain cannot report
   * dependency paths.
   */
  depsPaths?: () => Record<string, string>;
  /** Application environment lookup; undefined when the key is not set. */
  appEnv(app: string, key: string): unknown;
  /** Build directory of the project's own application */
  appPath(): string;
  /** Directory of an application inside the build output */
  appDir(app: string, relativePath?: string): string;
  loadpaths(args: string[]): Promise<void>;
  compile(args: string[]): Promise<void>;
}

export interface ProjectTasks {
  loadpaths?: string;
  compile?: string;
}

/** Shape of project.yaml */
export interface ProjectFile {
  app: string;
  apps_path?: string;
  build_path?: string;
  env?: string;
  deps?: Record<string, string>;
  config?: Record<string, Record<string, unknown>>;
  repos?: Record<string, string>;
  tasks?: ProjectTasks;
}

export function findProjectRoot(start: string = process.cwd()): string {
  let dir = start;
  while (true) {
    if (fs.existsSync(path.join(dir, PROJECT_FILE))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return start;
}

export function getProjectFilePath(root: string): string {
  return path.join(root, PROJECT_FILE);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(raw: Record<string, unknown>, key: string, file: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new TaskError(`Invalid ${file}: "${key}" must be a string`);
  }
  return value;
}

function stringMap(raw: Record<string, unknown>, key: string, file: string): Record<string, string> | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new TaskError(`Invalid ${file}: "${key}" must be a mapping`);
  }
  const result: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new TaskError(`Invalid ${file}: "${key}.${name}" must be a string`);
    }
    result[name] = entry;
  }
  return result;
}

/**
 * Parse and validate the contents of a project file.
 */
export function parseProjectFile(content: string, file: string = PROJECT_FILE): ProjectFile {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new TaskError(`Invalid ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(raw)) {
    throw new TaskError(`Invalid ${file}: expected a mapping at the top level`);
  }

  const app = optionalString(raw, 'app', file);
  if (!app) {
    throw new TaskError(`Invalid ${file}: "app" is required`);
  }

  let config: Record<string, Record<string, unknown>> | undefined;
  if (raw['config'] !== undefined && raw['config'] !== null) {
    if (!isRecord(raw['config'])) {
      throw new TaskError(`Invalid ${file}: "config" must be a mapping`);
    }
    config = {};
    for (const [appName, env] of Object.entries(raw['config'])) {
      if (!isRecord(env)) {
        throw new TaskError(`Invalid ${file}: "config.${appName}" must be a mapping`);
      }
      config[appName] = env;
    }
  }

  let tasks: ProjectTasks | undefined;
  if (raw['tasks'] !== undefined && raw['tasks'] !== null) {
    const parsed = stringMap(raw, 'tasks', file) ?? {};
    tasks = { loadpaths: parsed['loadpaths'], compile: parsed['compile'] };
  }

  return {
    app,
    apps_path: optionalString(raw, 'apps_path', file),
    build_path: optionalString(raw, 'build_path', file),
    env: optionalString(raw, 'env', file),
    deps: stringMap(raw, 'deps', file),
    config,
    repos: stringMap(raw, 'repos', file),
    tasks,
  };
}

export function readProjectFile(root: string): ProjectFile {
  const filePath = getProjectFilePath(root);
  if (!fs.existsSync(filePath)) {
    throw new TaskError(`Could not find ${PROJECT_FILE} in ${root}`);
  }
  return parseProjectFile(fs.readFileSync(filePath, 'utf-8'), filePath);
}

/**
 * Project backed by a parsed project.yaml.
 */
export class FileProject implements Project {
  readonly app: string;
  readonly depsPaths?: () => Record<string, string>;
  private readonly buildEnv: string;

  constructor(
    readonly root: string,
    private readonly file: ProjectFile,
    env: NodeJS.ProcessEnv = process.env,
  ) {
    this.app = file.app;
    this.buildEnv = file.env ?? env['REPO_TASKS_ENV'] ?? DEFAULT_ENV;

    const deps = file.deps;
    if (deps) {
      this.depsPaths = () => ({ ...deps });
    }
  }

  /** Repo name -> module file, relative to the root */
  get repoModules(): Record<string, string> {
    return { ...(this.file.repos ?? {}) };
  }

  isUmbrella(): boolean {
    return this.file.apps_path !== undefined;
  }

  appEnv(app: string, key: string): unknown {
    return this.file.config?.[app]?.[key];
  }

  buildPath(): string {
    return path.join(this.root, this.file.build_path ?? DEFAULT_BUILD_PATH, this.buildEnv);
  }

  appPath(): string {
    return this.appDir(this.app);
  }

  appDir(app: string, relativePath = ''): string {
    return path.join(this.buildPath(), 'lib', app, relativePath);
  }

  async loadpaths(_args: string[]): Promise<void> {
    this.runTask(this.file.tasks?.loadpaths);
  }

  async compile(_args: string[]): Promise<void> {
    this.runTask(this.file.tasks?.compile);
  }

  private runTask(command: string | undefined): void {
    if (!command) return;
    execSync(command, { cwd: this.root, stdio: 'inherit' });
  }
}

export function loadProject(root: string = findProjectRoot(), env: NodeJS.ProcessEnv = process.env): FileProject {
  return new FileProject(root, readProjectFile(root), env);
}
