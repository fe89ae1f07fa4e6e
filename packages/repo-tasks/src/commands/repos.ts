/**
 * repo-tasks repos command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createTaskContext } from '../utils/context.js';
import { ensureRepo, migrationsPath, parseRepo, type TaskContext } from '../utils/repo-helpers.js';

export function registerReposCommand(program: Command, createContext: () => TaskContext = createTaskContext): void {
  program
    .command('repos')
    .description('List the repositories tasks would operate on')
    .argument('[args...]', 'Task arguments (-r/--repo <name>, --no-compile)')
    .allowUnknownOption()
    .action(async (args: string[]) => {
      try {
        const ctx = createContext();
        const names = parseRepo(args, ctx);

        if (names.length === 0) {
          console.log('No repositories configured.');
          return;
        }

        for (const name of names) {
          const repo = await ensureRepo(name, args, ctx);
          console.log(`  ${chalk.bold(repo.name)}`);
          console.log(`    Adapter:    ${repo.adapter().name}`);
          console.log(`    Migrations: ${migrationsPath(repo, ctx)}`);
        }
      } catch (error) {
        console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
