/**
 * Resolution logging
 *
 * Every line goes to stderr so `--json` output on stdout stays parseable.
 * Each adapter logs through a child scoped to its source kind, e.g.
 * `[WARN] [git] Skipping template "broken": ...`.
 */

import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  /** Logger whose lines carry an additional scope segment */
  child(scope: string): Logger;
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: chalk.gray('[DEBUG]'),
  [LogLevel.INFO]: chalk.cyan('[INFO]'),
  [LogLevel.WARN]: chalk.yellow('[WARN]'),
};

/**
 * Render a context record as `key=value` pairs; strings stay unquoted
 */
export function formatContext(context?: LogContext): string {
  if (!context) {
    return '';
  }
  return Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(' ');
}

export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel = LogLevel.WARN,
    private readonly scope?: string
  ) {}

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, message, context);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  format(level: LogLevel, message: string, context?: LogContext): string {
    const parts = [LEVEL_LABELS[level]];
    if (this.scope) {
      parts.push(`[${this.scope}]`);
    }
    parts.push(message);
    const details = formatContext(context);
    if (details) {
      parts.push(chalk.gray(details));
    }
    return parts.join(' ');
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (level >= this.level) {
      console.error(this.format(level, message, context));
    }
  }
}

/**
 * Discards everything; for library consumers that bring no logger
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  child(_scope: string): Logger {
    return this;
  }
}

/**
 * Warnings only, unless DEBUG=1 (or `true`) asks for everything
 */
export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const verbose = env.DEBUG === '1' || env.DEBUG === 'true';
  return new ConsoleLogger(verbose ? LogLevel.DEBUG : LogLevel.WARN);
}
