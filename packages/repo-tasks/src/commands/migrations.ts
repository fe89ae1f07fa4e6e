/**
 * repo-tasks migrations.* commands
 *
 * - migrations.path: print each repo's migrations directory
 * - migrations.check: verify each repo loads and has a migrations directory
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createTaskContext } from '../utils/context.js';
import {
  ensureMigrationsPath,
  ensureRepo,
  migrationsPath,
  parseRepo,
  type TaskContext,
} from '../utils/repo-helpers.js';

export function registerMigrationsCommands(program: Command, createContext: () => TaskContext = createTaskContext): void {
  program
    .command('migrations.path')
    .description('Print the migrations directory of each repository')
    .argument('[args...]', 'Task arguments (-r/--repo <name>, --no-compile)')
    .allowUnknownOption()
    .action(async (args: string[]) => {
      try {
        const ctx = createContext();
        for (const name of parseRepo(args, ctx)) {
          const repo = await ensureRepo(name, args, ctx);
          console.log(migrationsPath(repo, ctx));
        }
      } catch (error) {
        console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  program
    .command('migrations.check')
    .description('Check that each repository loads and has a migrations directory')
    .argument('[args...]', 'Task arguments (-r/--repo <name>, --no-compile)')
    .allowUnknownOption()
    .action(async (args: string[]) => {
      try {
        const ctx = createContext();
        for (const name of parseRepo(args, ctx)) {
          const repo = ensureMigrationsPath(await ensureRepo(name, args, ctx), ctx);
          console.log(chalk.green(`  ✓ ${repo.name}`));
        }
      } catch (error) {
        console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
