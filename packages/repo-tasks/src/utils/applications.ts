/**
 * In-process application controller.
 *
 * Applications are named groups with optional dependencies and start/stop
 * hooks. Starting an application starts its dependencies first.
 */

import { TaskError } from './errors.js';
import type { Logger } from './logger.js';
import type { AppName, RestartType } from '../types.js';

export interface ApplicationSpec {
  name: AppName;
  deps?: AppName[];
  start?: (restartType: RestartType) => Promise<void> | void;
  stop?: () => Promise<void> | void;
}

/** Application group of the mapping framework itself */
export const FRAMEWORK_APP = 'ecto';

export class ApplicationController {
  private readonly specs = new Map<AppName, ApplicationSpec>();
  private readonly started = new Map<AppName, RestartType>();

  constructor(private readonly logger?: Logger) {
    this.register({ name: FRAMEWORK_APP });
  }

  register(spec: ApplicationSpec): void {
    this.specs.set(spec.name, spec);
  }

  isRegistered(name: AppName): boolean {
    return this.specs.has(name);
  }

  isStarted(name: AppName): boolean {
    return this.started.has(name);
  }

  /** Started applications, in start order. */
  startedApplications(): AppName[] {
    return [...this.started.keys()];
  }

  /**
   * Start an application and everything it depends on.
   * Returns the applications that were started by this call, in order.
   */
  async ensureAllStarted(name: AppName, restartType: RestartType = 'temporary'): Promise<AppName[]> {
    const startedNow: AppName[] = [];
    await this.startWithDeps(name, restartType, startedNow, []);
    return startedNow;
  }

  /** Stop a started application. Returns false if it was not running. */
  async stop(name: AppName): Promise<boolean> {
    if (!this.started.has(name)) {
      return false;
    }
    const spec = this.specs.get(name);
    await spec?.stop?.();
    this.started.delete(name);
    this.logger?.info(`Application ${name} exited: stopped`);
    return true;
  }

  private async startWithDeps(
    name: AppName,
    restartType: RestartType,
    startedNow: AppName[],
    path: AppName[],
  ): Promise<void> {
    if (this.started.has(name)) return;

    const spec = this.specs.get(name);
    if (!spec) {
      throw new TaskError(`Could not start application ${name}: application is not registered`);
    }
    if (path.includes(name)) {
      throw new TaskError(`Could not start application ${name}: circular dependency ${[...path, name].join(' -> ')}`);
    }

    for (const dep of spec.deps ?? []) {
      await this.startWithDeps(dep, restartType, startedNow, [...path, name]);
    }

    await spec.start?.(restartType);
    this.started.set(name, restartType);
    startedNow.push(name);
    this.logger?.debug(`Application ${name} started (${restartType})`);
  }
}
