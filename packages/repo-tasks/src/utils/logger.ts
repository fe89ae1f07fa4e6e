/**
 * Leveled logging on pino, written out through detachable backends.
 *
 * pino does the level filtering; every line it emits is handed to the
 * attached backends. The console backend can be removed while noisy work
 * runs (application restarts) and re-added afterwards.
 */

import chalk from 'chalk';
import pino, { type DestinationStream, type Logger as PinoLogger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogBackend {
  write(level: LogLevel, message: string): void;
  /** Write out anything buffered. */
  flush?(): void;
}

export interface AddBackendOptions {
  flush?: boolean;
}

export const CONSOLE_BACKEND = 'console';

/** Writes chalk-coloured lines; warnings and errors go to stderr. */
export const consoleBackend: LogBackend = {
  write(level, message) {
    switch (level) {
      case 'debug':
        console.log(chalk.dim(`  ${message}`));
        break;
      case 'info':
        console.log(chalk.cyan(`  ${message}`));
        break;
      case 'warn':
        console.error(chalk.yellow(`  ${message}`));
        break;
      case 'error':
        console.error(chalk.red(`  ${message}`));
        break;
    }
  },
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find(level => level === normalized) ?? 'info';
}

/** Map a pino level number onto ours; trace folds into debug, fatal into error. */
function levelOf(value: unknown): LogLevel {
  const label = typeof value === 'number' ? pino.levels.labels[value] : undefined;
  if (label === 'trace') return 'debug';
  return LEVELS.find(level => level === label) ?? 'error';
}

export class Logger {
  private readonly backends = new Map<string, LogBackend>();
  private readonly output: PinoLogger;

  constructor(
    level: LogLevel = 'info',
    backends: Record<string, LogBackend> = { [CONSOLE_BACKEND]: consoleBackend },
  ) {
    for (const [name, backend] of Object.entries(backends)) {
      this.backends.set(name, backend);
    }
    const destination: DestinationStream = {
      write: line => this.dispatch(line),
    };
    this.output = pino({ level, base: null, timestamp: false }, destination);
  }

  hasBackend(name: string): boolean {
    return this.backends.has(name);
  }

  /** Detach a backend. Returns the detached backend, if any. */
  removeBackend(name: string): LogBackend | undefined {
    const backend = this.backends.get(name);
    this.backends.delete(name);
    return backend;
  }

  /**
   * Attach a backend. Without an explicit backend, the console backend is
   * attached under the given name.
   */
  addBackend(name: string, backend: LogBackend = consoleBackend, options: AddBackendOptions = {}): void {
    this.backends.set(name, backend);
    if (options.flush) {
      backend.flush?.();
    }
  }

  debug(message: string): void {
    this.output.debug(message);
  }

  info(message: string): void {
    this.output.info(message);
  }

  warn(message: string): void {
    this.output.warn(message);
  }

  error(message: string): void {
    this.output.error(message);
  }

  private dispatch(line: string): void {
    if (this.backends.size === 0) return;
    const record: unknown = JSON.parse(line);
    if (typeof record !== 'object' || record === null) return;
    const level = levelOf(Reflect.get(record, 'level'));
    const msg = Reflect.get(record, 'msg');
    const message = typeof msg === 'string' ? msg : '';
    for (const backend of this.backends.values()) {
      backend.write(level, message);
    }
  }
}

/** Logger configured from LOG_LEVEL. */
export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  return new Logger(parseLogLevel(env['LOG_LEVEL']));
}
