/**
 * Tests for project.yaml handling (utils/project.ts)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  FileProject,
  findProjectRoot,
  loadProject,
  parseProjectFile,
} from '../utils/project.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'repo-tasks-project-'));
});

afterEach(() => {
  try {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
});

const SAMPLE = `
app: my_app
deps:
  ecto: deps/ecto
config:
  my_app:
    ecto_repos: [MyApp.Repo]
repos:
  MyApp.Repo: lib/repo.js
tasks:
  compile: "true"
`;

describe('parseProjectFile', () => {
  it('parses all sections', () => {
    const file = parseProjectFile(SAMPLE);
    expect(file.app).toBe('my_app');
    expect(file.deps).toEqual({ ecto: 'deps/ecto' });
    expect(file.config).toEqual({ my_app: { ecto_repos: ['MyApp.Repo'] } });
    expect(file.repos).toEqual({ 'MyApp.Repo': 'lib/repo.js' });
    expect(file.tasks).toEqual({ loadpaths: undefined, compile: 'true' });
    expect(file.apps_path).toBeUndefined();
  });

  it('requires app', () => {
    expect(() => parseProjectFile('deps: {}', 'project.yaml')).toThrow('Invalid project.yaml: "app" is required');
  });

  it('rejects a non-mapping document', () => {
    expect(() => parseProjectFile('- a\n- b', 'project.yaml')).toThrow(
      'Invalid project.yaml: expected a mapping at the top level',
    );
  });

  it('rejects non-string repo files', () => {
    expect(() => parseProjectFile('app: x\nrepos:\n  MyApp.Repo: 3', 'project.yaml')).toThrow(
      'Invalid project.yaml: "repos.MyApp.Repo" must be a string',
    );
  });

  it('rejects a config entry that is not a mapping', () => {
    expect(() => parseProjectFile('app: x\nconfig:\n  x: 1', 'project.yaml')).toThrow(
      'Invalid project.yaml: "config.x" must be a mapping',
    );
  });

  it('reports YAML syntax errors', () => {
    expect(() => parseProjectFile('app: [unclosed', 'project.yaml')).toThrow(/^Invalid project\.yaml: /);
  });
});

describe('findProjectRoot', () => {
  it('walks up to the directory holding project.yaml', () => {
    fs.writeFileSync(path.join(tmpDir, 'project.yaml'), 'app: my_app\n');
    const nested = path.join(tmpDir, 'lib', 'nested');
    fs.mkdirSync(nested, { recursive: true });
    expect(findProjectRoot(nested)).toBe(tmpDir);
  });

  it('falls back to the start directory', () => {
    const nested = path.join(tmpDir, 'empty');
    fs.mkdirSync(nested);
    // tmpdir itself is assumed not to sit below a project.yaml
    expect(findProjectRoot(nested)).toBe(nested);
  });
});

describe('loadProject', () => {
  it('fails when project.yaml is missing', () => {
    expect(() => loadProject(tmpDir, {})).toThrow(`Could not find project.yaml in ${tmpDir}`);
  });

  it('reads project.yaml from the root', () => {
    fs.writeFileSync(path.join(tmpDir, 'project.yaml'), SAMPLE);
    const project = loadProject(tmpDir, {});
    expect(project.app).toBe('my_app');
    expect(project.repoModules).toEqual({ 'MyApp.Repo': 'lib/repo.js' });
  });
});

describe('FileProject', () => {
  it('resolves build directories from build_path and env', () => {
    const project = new FileProject('/srv/app', { app: 'my_app', build_path: 'out', env: 'test' }, {});
    expect(project.appPath()).toBe('/srv/app/out/test/lib/my_app');
    expect(project.appDir('other', 'priv/repo')).toBe('/srv/app/out/test/lib/other/priv/repo');
  });

  it('takes the build env from REPO_TASKS_ENV, defaulting to dev', () => {
    expect(new FileProject('/p', { app: 'a' }, { REPO_TASKS_ENV: 'prod' }).appPath()).toBe('/p/_build/prod/lib/a');
    expect(new FileProject('/p', { app: 'a' }, {}).appPath()).toBe('/p/_build/dev/lib/a');
  });

  it('is an umbrella when apps_path is set', () => {
    expect(new FileProject('/p', { app: 'a', apps_path: 'apps' }, {}).isUmbrella()).toBe(true);
    expect(new FileProject('/p', { app: 'a' }, {}).isUmbrella()).toBe(false);
  });

  it('reports dependency paths only when deps are declared', () => {
    expect(new FileProject('/p', { app: 'a' }, {}).depsPaths).toBeUndefined();
    const project = new FileProject('/p', { app: 'a', deps: { ecto: 'deps/ecto' } }, {});
    expect(project.depsPaths?.()).toEqual({ ecto: 'deps/ecto' });
  });

  it('reads the application environment', () => {
    const project = new FileProject('/p', { app: 'a', config: { a: { ecto_repos: ['A.Repo'] } } }, {});
    expect(project.appEnv('a', 'ecto_repos')).toEqual(['A.Repo']);
    expect(project.appEnv('a', 'missing')).toBeUndefined();
    expect(project.appEnv('b', 'ecto_repos')).toBeUndefined();
  });

  it('treats unconfigured tasks as no-ops', async () => {
    const project = new FileProject(tmpDir, { app: 'a' }, {});
    await expect(project.loadpaths([])).resolves.toBeUndefined();
    await expect(project.compile(['--force'])).resolves.toBeUndefined();
  });
});
