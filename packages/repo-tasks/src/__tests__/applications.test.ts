/**
 * Tests for the application controller (utils/applications.ts)
 */

import { describe, it, expect } from 'vitest';
import { ApplicationController, FRAMEWORK_APP } from '../utils/applications.js';
import { Logger } from '../utils/logger.js';
import { recordingBackend } from './fakes.js';

describe('ApplicationController', () => {
  it('registers the framework application by default', () => {
    const apps = new ApplicationController();
    expect(apps.isRegistered(FRAMEWORK_APP)).toBe(true);
    expect(apps.isStarted(FRAMEWORK_APP)).toBe(false);
  });

  it('starts dependencies before the application', async () => {
    const order: string[] = [];
    const apps = new ApplicationController();
    apps.register({ name: 'db', start: () => { order.push('db'); } });
    apps.register({ name: 'pool', deps: ['db'], start: () => { order.push('pool'); } });
    apps.register({ name: 'web', deps: ['pool', 'db'], start: () => { order.push('web'); } });

    await expect(apps.ensureAllStarted('web')).resolves.toEqual(['db', 'pool', 'web']);
    expect(order).toEqual(['db', 'pool', 'web']);
    expect(apps.startedApplications()).toEqual(['db', 'pool', 'web']);
  });

  it('returns only the applications started by the call', async () => {
    const apps = new ApplicationController();
    apps.register({ name: 'db' });
    apps.register({ name: 'web', deps: ['db'] });

    await apps.ensureAllStarted('db');
    await expect(apps.ensureAllStarted('web')).resolves.toEqual(['web']);
    await expect(apps.ensureAllStarted('web')).resolves.toEqual([]);
  });

  it('passes the restart type to start hooks', async () => {
    const types: string[] = [];
    const apps = new ApplicationController();
    apps.register({ name: 'db', start: type => { types.push(type); } });

    await apps.ensureAllStarted('db', 'permanent');
    expect(types).toEqual(['permanent']);
  });

  it('fails for an unregistered application', async () => {
    const apps = new ApplicationController();
    await expect(apps.ensureAllStarted('missing')).rejects.toThrow(
      'Could not start application missing: application is not registered',
    );
  });

  it('fails on circular dependencies', async () => {
    const apps = new ApplicationController();
    apps.register({ name: 'a', deps: ['b'] });
    apps.register({ name: 'b', deps: ['a'] });
    await expect(apps.ensureAllStarted('a')).rejects.toThrow(
      'Could not start application a: circular dependency a -> b -> a',
    );
  });

  it('stops started applications and logs it', async () => {
    const backend = recordingBackend();
    const apps = new ApplicationController(new Logger('info', { console: backend }));
    let stopped = 0;
    apps.register({ name: 'db', stop: () => { stopped++; } });

    await apps.ensureAllStarted('db');
    await expect(apps.stop('db')).resolves.toBe(true);
    expect(stopped).toBe(1);
    expect(apps.isStarted('db')).toBe(false);
    expect(backend.lines).toEqual([['info', 'Application db exited: stopped']]);
  });

  it('treats stopping an application that is not running as a no-op', async () => {
    const apps = new ApplicationController();
    let stopped = 0;
    apps.register({ name: 'db', stop: () => { stopped++; } });

    await expect(apps.stop('db')).resolves.toBe(false);
    expect(stopped).toBe(0);
  });
});
