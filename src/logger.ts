import type { Logger as ILogger, LogLevel } from './types';

const COLOR_RED = '\x1b[31m';
const COLOR_GREEN = '\x1b[32m';
const COLOR_YELLOW = '\x1b[33m';
const COLOR_MAGENTA = '\x1b[35m';

const COLOR_RESET = '\x1b[0m';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  log: 1,
  warn: 2,
  error: 3,
};

export class Logger implements ILogger {
  constructor(readonly name: string, readonly level: LogLevel = 'log') {}

  debug(message: unknown, ...args: unknown[]): void {
    if (!this.isEnabled('debug')) return;

    console.debug(COLOR_MAGENTA, this.format('DEBUG', message, args), COLOR_RESET);
  }

  log(message: unknown, ...args: unknown[]): void {
    if (!this.isEnabled('log')) return;

    console.log(COLOR_GREEN, this.format('LOG', message, args), COLOR_RESET);
  }

  warn(message: unknown, ...args: unknown[]): void {
    if (!this.isEnabled('warn')) return;

    console.warn(COLOR_YELLOW, this.format('WARN', message, args), COLOR_RESET);
  }

  error(message: unknown, ...args: unknown[]): void {
    console.error(COLOR_RED, this.format('ERROR', message, args), COLOR_RESET);
  }

  public isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private format(tag: string, message: unknown, args: unknown[]): string {
    return `[${this.name}] [${tag}]:  ${String(message)} ${args.join(' ')}`;
  }
}
