/**
 * repo-tasks gen.migration command
 *
 * Creates a timestamped migration file in the first resolved repo's
 * migrations directory and opens it in ECTO_EDITOR, if set.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import { createTaskContext } from '../utils/context.js';
import { TaskError } from '../utils/errors.js';
import { underscore } from '../utils/naming.js';
import {
  ensureRepo,
  noUmbrella,
  open,
  parseRepo,
  sourceRepoPriv,
  type TaskContext,
} from '../utils/repo-helpers.js';
import type { Repo } from '../types.js';

const TASK_NAME = 'gen.migration';
const VALUE_FLAGS = ['--repo', '-r'];

/** Tokens that are neither flags nor flag values */
export function positionalArgs(args: string[]): string[] {
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (VALUE_FLAGS.includes(arg)) {
      i++;
    } else if (!arg.startsWith('-')) {
      positional.push(arg);
    }
  }
  return positional;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** UTC timestamp as yyyymmddhhmmss */
export function timestamp(date: Date): string {
  return [
    date.getUTCFullYear(),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds()),
  ].join('');
}

export function migrationTemplate(name: string): string {
  return `/**
 * Migration: ${name}
 */

export async function up(): Promise<void> {
}

export async function down(): Promise<void> {
}
`;
}

/**
 * Write a new migration for `repo` under its source priv directory.
 * Returns the created file path.
 */
export function generateMigration(
  repo: Repo,
  name: string,
  ctx: Pick<TaskContext, 'project'>,
  now: Date = new Date(),
): string {
  const base = underscore(name);
  const dir = path.join(ctx.project.root, sourceRepoPriv(repo), 'migrations');
  fs.mkdirSync(dir, { recursive: true });

  const existing = fs.readdirSync(dir).find(file => file.endsWith(`_${base}.ts`));
  if (existing) {
    throw new TaskError(`Migration can't be created, there is already a migration file with name ${base}: ${existing}`);
  }

  const file = path.join(dir, `${timestamp(now)}_${base}.ts`);
  fs.writeFileSync(file, migrationTemplate(name));
  return file;
}

export function registerGenMigrationCommand(program: Command, createContext: () => TaskContext = createTaskContext): void {
  program
    .command(TASK_NAME)
    .description('Generate a new migration for the repo')
    .argument('[args...]', 'Migration name and task arguments (-r/--repo <name>, --no-compile)')
    .allowUnknownOption()
    .action(async (args: string[]) => {
      try {
        const ctx = createContext();
        noUmbrella(TASK_NAME, ctx);

        const [name] = positionalArgs(args);
        if (!name) {
          throw new TaskError(`expected ${TASK_NAME} to receive the migration file name, got: ${JSON.stringify(args.join(' '))}`);
        }

        const [repoName] = parseRepo(args, ctx);
        if (!repoName) {
          throw new TaskError('No repository to generate a migration for. Configure ecto_repos or pass -r.');
        }

        const repo = await ensureRepo(repoName, args, ctx);
        const file = generateMigration(repo, name, ctx);
        console.log(`${chalk.green('* creating')} ${path.relative(ctx.project.root, file)}`);
        open(file, ctx);
      } catch (error) {
        console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
