/**
 * Structured logging with pluggable transports.
 *
 *  - One global Logger instance (exported as `logger`), plus per-component
 *    child loggers created via logger.child('component').
 *  - Entries carry level, message, ISO 8601 timestamp, optional component,
 *    arbitrary data and structured error info.
 *  - ConsoleTransport writes coloured lines to stderr, keeping stdout free
 *    for merged documents. MemoryTransport collects entries in an array.
 */

import chalk from 'chalk';

// ── Log level ordering ────────────────────────────────────────────────────

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// ── Log entry ─────────────────────────────────────────────────────────────

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** e.g. 'cli', 'layers', 'merge:trace' */
  component?: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface Transport {
  write(entry: LogEntry): void;
}

// ── ConsoleTransport ──────────────────────────────────────────────────────

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
  fatal: chalk.bgRed.white,
};

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: ' INFO',
  warn: ' WARN',
  error: 'ERROR',
  fatal: 'FATAL',
};

export function formatEntry(entry: LogEntry): string {
  const label = LEVEL_COLOR[entry.level](LEVEL_LABEL[entry.level]);
  const comp = entry.component ? chalk.blue(` [${entry.component}]`) : '';

  let line = `${chalk.dim(entry.timestamp)} ${label}${comp} ${entry.message}`;

  if (entry.data && Object.keys(entry.data).length > 0) {
    line += ' ' + chalk.dim(JSON.stringify(entry.data));
  }

  if (entry.error) {
    const code = entry.error.code ? ` (${entry.error.code})` : '';
    line += chalk.red(` | ${entry.error.name}${code}: ${entry.error.message}`);
    if (entry.error.stack && entry.level === 'debug') {
      line += '\n' + chalk.dim(entry.error.stack);
    }
  }

  return line;
}

export class ConsoleTransport implements Transport {
  private stream: NodeJS.WritableStream;

  constructor(stream: NodeJS.WritableStream = process.stderr) {
    this.stream = stream;
  }

  write(entry: LogEntry): void {
    this.stream.write(formatEntry(entry) + '\n');
  }
}

// ── MemoryTransport ───────────────────────────────────────────────────────

export class MemoryTransport implements Transport {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => level === undefined || e.level === level).map((e) => e.message);
  }
}

// ── Logger ────────────────────────────────────────────────────────────────

export interface LoggerOptions {
  level?: LogLevel;
  transports?: Transport[];
  component?: string;
}

export interface LevelRef {
  current: LogLevel;
}

function errorCode(err: Error): string | undefined {
  if ('code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

export class Logger {
  private level: LevelRef;
  private transports: Transport[];
  private component?: string;

  constructor(options?: LoggerOptions, level?: LevelRef) {
    this.level = level ?? { current: options?.level ?? 'info' };
    this.transports = options?.transports ?? [new ConsoleTransport()];
    this.component = options?.component;
  }

  /** Applies to this logger, its parent and every child sharing the level. */
  setLevel(level: LogLevel): void {
    this.level.current = level;
  }

  getLevel(): LogLevel {
    return this.level.current;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level.current];
  }

  addTransport(transport: Transport): void {
    this.transports.push(transport);
  }

  /**
   * Child logger stamping every entry with the given component. Level and
   * transport array are shared with the parent, so later changes to either
   * reach the child too.
   */
  child(component: string): Logger {
    return new Logger({ transports: this.transports, component }, this.level);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, errorOrData?: Error | Record<string, unknown>, data?: Record<string, unknown>): void {
    if (errorOrData instanceof Error) {
      this.log('error', message, data, errorOrData);
    } else {
      this.log('error', message, errorOrData);
    }
  }

  fatal(message: string, errorOrData?: Error | Record<string, unknown>, data?: Record<string, unknown>): void {
    if (errorOrData instanceof Error) {
      this.log('fatal', message, data, errorOrData);
    } else {
      this.log('fatal', message, errorOrData);
    }
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>, err?: Error): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      component: this.component,
      data,
    };
    if (err) {
      entry.error = { name: err.name, message: err.message, code: errorCode(err), stack: err.stack };
    }

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

// ── Global singleton ──────────────────────────────────────────────────────

function levelFromEnv(): LogLevel {
  const raw = process.env['LOG_LEVEL'];
  return raw !== undefined && isLogLevel(raw) ? raw : 'info';
}

/**
 * Global logger. Components call `logger.child('name')` rather than
 * logging through this directly.
 */
export const logger = new Logger({ level: levelFromEnv() });
