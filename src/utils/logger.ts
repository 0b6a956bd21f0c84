/**
 * Simple logger with log level filtering
 */

import { LogLevel } from '../types/config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

interface LevelState {
  level: LogLevel;
}

export class Logger {
  constructor(
    private readonly state: LevelState = { level: 'info' },
    private readonly scope?: string
  ) {}

  setLevel(level: LogLevel): void {
    this.state.level = level;
    this.debug(`Log level set to ${level}`);
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  /**
   * Scoped logger sharing the level of its parent
   */
  child(scope: string): Logger {
    return new Logger(this.state, this.scope ? `${this.scope}:${scope}` : scope);
  }

  error(message: string, error?: unknown): void {
    if (!this.shouldLog('error')) return;
    if (error !== undefined) {
      console.error(this.prefix('ERROR', message), error);
    } else {
      console.error(this.prefix('ERROR', message));
    }
  }

  warn(message: string, details?: unknown): void {
    if (!this.shouldLog('warn')) return;
    if (details !== undefined) {
      console.warn(this.prefix('WARN', message), details);
    } else {
      console.warn(this.prefix('WARN', message));
    }
  }

  info(message: string, details?: unknown): void {
    if (!this.shouldLog('info')) return;
    if (details !== undefined) {
      console.log(this.prefix('INFO', message), details);
    } else {
      console.log(this.prefix('INFO', message));
    }
  }

  debug(message: string, details?: unknown): void {
    if (!this.shouldLog('debug')) return;
    if (details !== undefined) {
      console.debug(this.prefix('DEBUG', message), details);
    } else {
      console.debug(this.prefix('DEBUG', message));
    }
  }

  private prefix(tag: string, message: string): string {
    return this.scope ? `[${tag}] [${this.scope}] ${message}` : `[${tag}] ${message}`;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.state.level];
  }
}

export const logger = new Logger();
