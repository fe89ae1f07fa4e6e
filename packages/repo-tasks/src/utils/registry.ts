/**
 * Module loaders: resolve a repository name to a loaded module.
 */

import * as path from 'path';
import { pathToFileURL } from 'url';
import { lastSegment } from './naming.js';
import type { LoadResult, ModuleLoader } from '../types.js';

/** Modules registered in process */
export class ModuleRegistry implements ModuleLoader {
  private readonly modules = new Map<string, unknown>();

  register(name: string, module: unknown): this {
    this.modules.set(name, module);
    return this;
  }

  async load(name: string): Promise<LoadResult> {
    if (!this.modules.has(name)) {
      return { ok: false, error: 'nofile' };
    }
    return { ok: true, module: this.modules.get(name) };
  }
}

/**
 * Loads modules from files declared in project.yaml. The module's default
 * export is used, or else the export named after the last name segment.
 */
export class FileModuleLoader implements ModuleLoader {
  constructor(
    private readonly root: string,
    private readonly files: Record<string, string>,
  ) {}

  async load(name: string): Promise<LoadResult> {
    const file = this.files[name];
    if (file === undefined) {
      return { ok: false, error: 'nofile' };
    }

    let exports: Record<string, unknown>;
    try {
      exports = await import(pathToFileURL(path.resolve(this.root, file)).href);
    } catch (error) {
      return { ok: false, error };
    }

    const module = exports['default'] ?? exports[lastSegment(name)];
    if (module === undefined) {
      return { ok: false, error: `${file} exports neither a default nor ${lastSegment(name)}` };
    }
    return { ok: true, module };
  }
}
