/**
 * Logging
 *
 * Console logging with a bracketed scope prefix, e.g. `[hipchat] ...`.
 *
 * @module logging/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Unrecoverable condition; the caller decides whether to exit */
  fatal(message: string): void;
}

/**
 * Environment variable that turns on debug output
 */
export const DEBUG_ENV_VAR = 'HIPCHAT_JOB_XML_DEBUG';

/**
 * Console logger for a scope
 */
export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly debugEnabled: boolean;

  constructor(scope: string, debugEnabled: boolean = Boolean(process.env[DEBUG_ENV_VAR])) {
    this.prefix = `[${scope}]`;
    this.debugEnabled = debugEnabled;
  }

  debug(message: string): void {
    if (this.debugEnabled) {
      console.debug(`${this.prefix} ${message}`);
    }
  }

  info(message: string): void {
    console.log(`${this.prefix} ${message}`);
  }

  warn(message: string): void {
    console.warn(`${this.prefix} WARNING: ${message}`);
  }

  error(message: string): void {
    console.error(`${this.prefix} ${message}`);
  }

  fatal(message: string): void {
    console.error(`${this.prefix} FATAL: ${message}`);
  }
}

/**
 * Logger that keeps entries in memory
 */
export class MemoryLogger implements Logger {
  readonly entries: Array<{ level: LogLevel; message: string }> = [];

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  fatal(message: string): void {
    this.entries.push({ level: 'fatal', message });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}

export function createLogger(scope: string): Logger {
  return new ConsoleLogger(scope);
}
