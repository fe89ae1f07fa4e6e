/**
 * Repository task types
 */

import type { ApplicationController } from './utils/applications.js';

/** Name of a repository module, e.g. "MyApp.Repo" */
export type RepoName = string;

/** Name of an application group known to the application controller */
export type AppName = string;

/** How a started application reacts when it exits */
export type RestartType = 'permanent' | 'transient' | 'temporary';

/** Key-value settings of a repository (otp_app, priv, adapter settings) */
export interface RepoConfig {
  otp_app?: string;
  priv?: string;
  [key: string]: unknown;
}

/** Storage backend a repository delegates to */
export interface Adapter {
  name: string;
  /**
   * Start whatever the adapter needs through `applications`, returning the
   * apps it started.
   */
  ensureAllStarted(repo: Repo, restartType: RestartType, applications: ApplicationController): Promise<AppName[]>;
}

export type StartLinkResult =
  | { ok: true; pid: number }
  | { ok: false; error: StartLinkError };

export type StartLinkError =
  | { alreadyStarted: number }
  | { reason: unknown };

export interface StartLinkOptions {
  poolSize: number;
}

/** A loaded repository module */
export interface Repo {
  name: RepoName;
  config(): RepoConfig;
  /** Capability probe: only repositories expose their adapter. */
  adapter(): Adapter;
  startLink(options: StartLinkOptions): Promise<StartLinkResult>;
  /** Behaviours the module declares it implements */
  behaviours?: string[];
}

/** A loaded repository module; the name comes from how it was resolved. */
export type RepoModule = Omit<Repo, 'name'>;

/** Anything that declares the behaviours it implements */
export interface BehaviourModule {
  name: string;
  behaviours?: string[];
}

/** Outcome of loading a module by name; the module itself is not yet checked. */
export type LoadResult =
  | { ok: true; module: unknown }
  | { ok: false; error: unknown };

export interface ModuleLoader {
  load(name: string): Promise<LoadResult>;
}

/** What ensureStarted hands back */
export interface StartedRepo {
  pid: number | null;
  apps: AppName[];
}

export interface EnsureStartedOptions {
  poolSize?: number;
}
