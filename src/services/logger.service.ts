/**
 * Logger Service - structured diagnostics for the first-response services.
 *
 * Usage:
 * ```typescript
 * private logger = inject(LoggerService).createChild('LocationService');
 *
 * this.logger.info('Fetching new position');
 * this.logger.error('Geocoding failed', err, { latitude, longitude });
 * ```
 */

import { Injectable, inject, signal } from '@angular/core';
import { FIRST_RESPONSE_ENVIRONMENT } from '../environments/environment.token';
import type { LogLevel } from '../environments/environment.types';

export type { LogLevel };

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  error?: Error;
  context?: Record<string, unknown>;
  /** Service that emitted the entry */
  source?: string;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  includeTimestamp: boolean;
  /** One JSON object per line instead of the readable prefix format */
  jsonOutput: boolean;
  defaultSource: string;
}

@Injectable({ providedIn: 'root' })
export class LoggerService {
  private config: LoggerConfig = {
    minLevel: inject(FIRST_RESPONSE_ENVIRONMENT).logLevel,
    includeTimestamp: true,
    jsonOutput: false,
    defaultSource: 'first-response',
  };

  private readonly recentLogs = signal<LogEntry[]>([]);
  private readonly maxRecentLogs = 100;

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  /**
   * Create a child logger that tags every entry with `source`.
   */
  createChild(source: string): ChildLogger {
    return new ChildLogger(this, source);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, undefined, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, undefined, undefined, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, undefined, undefined, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.write('error', message, undefined, error, context);
  }

  /**
   * Recent entries, oldest first.
   */
  getRecentLogs(): LogEntry[] {
    return this.recentLogs();
  }

  clearRecentLogs(): void {
    this.recentLogs.set([]);
  }

  /** @internal used by ChildLogger */
  write(
    level: LogLevel,
    message: string,
    source: string | undefined,
    error?: unknown,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_VALUES[level] < LOG_LEVEL_VALUES[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      error: toError(error),
      context,
      source: source ?? this.config.defaultSource,
    };

    this.recentLogs.update(logs => {
      const next = [...logs, entry];
      return next.length > this.maxRecentLogs ? next.slice(-this.maxRecentLogs) : next;
    });

    this.outputToConsole(entry);
  }

  private outputToConsole(entry: LogEntry): void {
    if (this.config.jsonOutput) {
      console.log(
        JSON.stringify({
          ...entry,
          error: entry.error ? { name: entry.error.name, message: entry.error.message } : undefined,
        })
      );
      return;
    }

    const parts: string[] = [];
    if (this.config.includeTimestamp) {
      parts.push(`[${entry.timestamp.slice(11, 19)}]`);
    }
    if (entry.source) {
      parts.push(`[${entry.source}]`);
    }
    parts.push(entry.message);

    const args: unknown[] = [parts.join(' ')];
    if (entry.context) {
      args.push(entry.context);
    }
    if (entry.error) {
      args.push(entry.error);
    }

    switch (entry.level) {
      case 'debug':
        console.debug(...args);
        break;
      case 'info':
        console.info(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
        console.error(...args);
        break;
    }
  }
}

function toError(value: unknown): Error | undefined {
  if (value === undefined || value === null) return undefined;
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Logger bound to one source name. Delegates to the shared LoggerService.
 */
export class ChildLogger {
  constructor(
    private readonly parent: LoggerService,
    readonly source: string
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.parent.write('debug', message, this.source, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.parent.write('info', message, this.source, undefined, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.parent.write('warn', message, this.source, undefined, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.parent.write('error', message, this.source, error, context);
  }
}
