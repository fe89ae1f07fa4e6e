/**
 * Conveniences for writing repository tasks: resolving repos from the
 * command line, making sure they are compiled and started, and locating
 * their migrations.
 */

import * as fs from 'fs';
import * as path from 'path';
import { spawnSync } from 'child_process';
import { TaskError, describeError } from './errors.js';
import { lastSegment, quote, underscore } from './naming.js';
import { FRAMEWORK_APP, type ApplicationController } from './applications.js';
import { CONSOLE_BACKEND, type Logger } from './logger.js';
import type { Project } from './project.js';
import type { Shell } from './shell.js';
import type {
  AppName,
  BehaviourModule,
  EnsureStartedOptions,
  ModuleLoader,
  Repo,
  RepoModule,
  RepoName,
  StartedRepo,
} from '../types.js';

const REPO_FLAGS = ['--repo', '-r'];
const REPOS_KEY = 'ecto_repos';
const EDITOR_ENV = 'ECTO_EDITOR';
const REMEDY = 'Please configure your app accordingly or pass a repo with the -r option.';

/** Everything the helpers touch outside their arguments */
export interface TaskContext {
  project: Project;
  loader: ModuleLoader;
  applications: ApplicationController;
  logger: Logger;
  shell: Shell;
  env: NodeJS.ProcessEnv;
  /** Runs a shell command, ignoring its exit status */
  runCommand?: (command: string) => void;
}

function defaultRunCommand(command: string): void {
  spawnSync(command, { shell: true, stdio: 'inherit' });
}

const REPO_FUNCTIONS = ['adapter', 'config', 'startLink'];

/** Capability check: repositories expose adapter, config and startLink. */
export function isRepoModule(value: unknown): value is RepoModule {
  if (typeof value !== 'object' || value === null) return false;
  return REPO_FUNCTIONS.every(key => typeof Reflect.get(value, key) === 'function');
}

export function isRepo(value: unknown): value is Repo {
  return isRepoModule(value) && typeof Reflect.get(value, 'name') === 'string';
}

/** Handle for `module` under the name it was loaded by. */
function bindRepo(name: RepoName, module: RepoModule): Repo {
  if (isRepo(module) && module.name === name) {
    return module;
  }
  return {
    name,
    config: () => module.config(),
    adapter: () => module.adapter(),
    startLink: options => module.startLink(options),
    behaviours: module.behaviours,
  };
}

/**
 * Parse the repositories named by `--repo`/`-r` flags, in order.
 *
 * Without any flag, falls back to the `ecto_repos` setting of the project's
 * application. A flag without a value is ignored.
 */
export function parseRepo(args: string[], ctx: Pick<TaskContext, 'project' | 'shell'>): RepoName[] {
  const repos: RepoName[] = [];
  let i = 0;
  while (i < args.length) {
    const key = args[i];
    const value = args[i + 1];
    if (key !== undefined && value !== undefined && REPO_FLAGS.includes(key)) {
      repos.push(value);
      i += 2;
    } else {
      i += 1;
    }
  }

  if (repos.length > 0) {
    return repos;
  }
  return configuredRepos(ctx);
}

function configuredRepos({ project, shell }: Pick<TaskContext, 'project' | 'shell'>): RepoName[] {
  const app = project.app;
  const configured = project.appEnv(app, REPOS_KEY);

  if (configured !== undefined && configured !== null && configured !== false) {
    if (!Array.isArray(configured) || !configured.every((repo): repo is string => typeof repo === 'string')) {
      throw new TaskError(`Expected ${REPOS_KEY} for application ${quote(app)} to be a list of repo names`);
    }
    return configured;
  }

  // Toolchains that cannot report dependency paths get the warning too.
  if (!project.depsPaths || FRAMEWORK_APP in project.depsPaths()) {
    shell.error(
      `warning: could not find repositories for application ${quote(app)}.

You can avoid this warning by passing the -r flag or by setting the
repositories managed by this application in your project.yaml:

    config:
      ${app}:
        ${REPOS_KEY}: [...]

The configuration may be an empty list if it does not define any repo.
`,
    );
  }
  return [];
}

/**
 * Ensure the named module is a repository: load paths, compile (unless
 * `--no-compile`), then load it and check for the adapter capability.
 */
export async function ensureRepo(
  name: RepoName,
  args: string[],
  ctx: Pick<TaskContext, 'project' | 'loader'>,
): Promise<Repo> {
  await ctx.project.loadpaths(args);

  if (!args.includes('--no-compile')) {
    await ctx.project.compile(args);
  }

  const result = await ctx.loader.load(name);
  if (!result.ok) {
    throw new TaskError(`Could not load ${name}, error: ${describeError(result.error)}. ${REMEDY}`);
  }
  if (!isRepoModule(result.module)) {
    throw new TaskError(`Module ${name} is not an Ecto.Repo. ${REMEDY}`);
  }
  return bindRepo(name, result.module);
}

/**
 * Start the framework, the repo's adapter dependencies and the repo itself.
 * A repo that is already running is not an error.
 */
export async function ensureStarted(
  repo: Repo,
  options: EnsureStartedOptions,
  ctx: Pick<TaskContext, 'applications'>,
): Promise<StartedRepo> {
  await ctx.applications.ensureAllStarted(FRAMEWORK_APP);
  const apps = await repo.adapter().ensureAllStarted(repo, 'temporary', ctx.applications);

  const poolSize = options.poolSize ?? 1;
  const result = await repo.startLink({ poolSize });
  if (result.ok) {
    return { pid: result.pid, apps };
  }
  if ('alreadyStarted' in result.error) {
    return { pid: null, apps };
  }
  throw new TaskError(`Could not start repo ${repo.name}, error: ${describeError(result.error.reason)}`);
}

/**
 * Ensure the repo's migrations directory exists. Umbrella projects are not
 * checked.
 */
export function ensureMigrationsPath(repo: Repo, ctx: Pick<TaskContext, 'project'>): Repo {
  const { project } = ctx;
  if (project.isUmbrella()) {
    return repo;
  }

  const relative = relativeTo(migrationsPath(repo, ctx), project.appPath());
  const resolved = path.resolve(project.root, relative);
  if (!isDirectory(resolved)) {
    throw new TaskError(`Could not find migrations directory ${quote(relative)} for repo ${repo.name}`);
  }
  return repo;
}

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

/** `target` relative to `from` when inside it; otherwise `target` unchanged. */
function relativeTo(target: string, from: string): string {
  const relative = path.relative(from, target);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return target;
  }
  return relative;
}

/**
 * Restart the given applications if any migration ran. Applications stop in
 * reverse order and start in the given order, with console logging muted.
 */
export async function restartAppsIfMigrated(
  apps: AppName[],
  migrated: unknown[],
  ctx: Pick<TaskContext, 'applications' | 'logger'>,
): Promise<void> {
  if (migrated.length === 0) return;

  // Silence the console to avoid application down messages.
  const consoleBackend = ctx.logger.removeBackend(CONSOLE_BACKEND);
  try {
    for (const app of [...apps].reverse()) {
      await ctx.applications.stop(app);
    }
    for (const app of apps) {
      // Apps the controller never heard of have nothing to restart.
      if (!ctx.applications.isRegistered(app)) continue;
      await ctx.applications.ensureAllStarted(app);
    }
  } finally {
    ctx.logger.addBackend(CONSOLE_BACKEND, consoleBackend, { flush: true });
  }
}

/** Migrations directory of a repo inside the build output */
export function migrationsPath(repo: Repo, ctx: Pick<TaskContext, 'project'>): string {
  return path.join(buildRepoPriv(repo, ctx), 'migrations');
}

/** Private directory of a repo, relative to the application source */
export function sourceRepoPriv(repo: Repo): string {
  const priv = repo.config().priv;
  if (priv !== undefined) {
    return priv;
  }
  return `priv/${underscore(lastSegment(repo.name))}`;
}

/** Private directory of a repo inside the build output */
export function buildRepoPriv(repo: Repo, ctx: Pick<TaskContext, 'project'>): string {
  const otpApp = repo.config().otp_app;
  if (!otpApp) {
    throw new TaskError(`Repo ${repo.name} is missing the required otp_app configuration`);
  }
  return ctx.project.appDir(otpApp, sourceRepoPriv(repo));
}

/**
 * Open a file in the editor named by ECTO_EDITOR. Returns false, doing
 * nothing, when no editor is configured.
 */
export function open(file: string, ctx: Pick<TaskContext, 'env' | 'runCommand'>): boolean {
  const editor = ctx.env[EDITOR_ENV] ?? '';
  if (editor === '') {
    return false;
  }
  const run = ctx.runCommand ?? defaultRunCommand;
  run(`${editor} ${quote(file)}`);
  return true;
}

/** Refuse to run a task from an umbrella project. */
export function noUmbrella(task: string, ctx: Pick<TaskContext, 'project'>): void {
  if (ctx.project.isUmbrella()) {
    throw new TaskError(`Cannot run task ${quote(task)} from umbrella application`);
  }
}

/** Ensure a module declares the given behaviour. */
export function ensureImplements(module: BehaviourModule, behaviour: string, message: string): void {
  if (!(module.behaviours ?? []).includes(behaviour)) {
    throw new TaskError(`Expected ${module.name} to implement ${behaviour} in order to ${message}`);
  }
}
