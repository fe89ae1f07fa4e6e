#!/usr/bin/env node

/**
 * repo-tasks - repository helpers for migration tasks
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { registerReposCommand } from './commands/repos.js';
import { registerMigrationsCommands } from './commands/migrations.js';
import { registerGenMigrationCommand } from './commands/gen-migration.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

program
  .name('repo-tasks')
  .description('Repository helpers for migration tasks')
  .version(pkg.version);

registerReposCommand(program);
registerMigrationsCommands(program);
registerGenMigrationCommand(program);

program.parse();
