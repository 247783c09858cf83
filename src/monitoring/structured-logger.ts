/**
 * Structured Logging
 *
 * Leveled logging with contextual metadata. Terminal output is coloured and
 * human-readable; JSON output is one object per line for log shipping.
 */

import chalk from 'chalk';

/**
 * Log severity levels (compatible with syslog and standard logging frameworks)
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Structured log entry with contextual metadata
 */
export interface LogEntry {
  timestamp: string; // ISO 8601 format
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export type LogFormat = 'pretty' | 'json';

/**
 * Receives every entry that passes the level filter, together with its formatted line
 */
export type LogSink = (entry: LogEntry, line: string) => void;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  minLevel?: LogLevel;
  format?: LogFormat;
  serviceName?: string;
  version?: string;
  /** Defaults to console.log */
  sink?: LogSink;
}

/**
 * Log level severity (higher = more severe)
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.cyan,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
  fatal: chalk.bgRed.white,
};

const defaultSink: LogSink = (_entry, line) => console.log(line);

/**
 * Structured logger for deployments
 */
export class StructuredLogger {
  private config: Required<Omit<LoggerConfig, 'sink'>>;
  private sink: LogSink;
  private baseContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}, baseContext: Record<string, unknown> = {}) {
    this.config = {
      minLevel: config.minLevel ?? 'info',
      format: config.format ?? 'pretty',
      serviceName: config.serviceName ?? 'sitelaunch',
      version: config.version ?? '1.0.0',
    };
    this.sink = config.sink ?? defaultSink;
    this.baseContext = baseContext;
  }

  /**
   * Logger that adds `context` to every entry it writes
   */
  child(context: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger({ ...this.config, sink: this.sink }, { ...this.baseContext, ...context });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): LogEntry {
    const merged = { ...this.baseContext, ...context };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }
    if (error instanceof Error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    } else if (error !== undefined) {
      entry.error = { name: 'Error', message: String(error) };
    }
    return entry;
  }

  private formatAsJson(entry: LogEntry): string {
    return JSON.stringify({
      ...entry,
      service: this.config.serviceName,
      version: this.config.version,
    });
  }

  private formatForTerminal(entry: LogEntry): string {
    const color = LEVEL_COLORS[entry.level];
    const time = new Date(entry.timestamp).toLocaleTimeString();
    const level = entry.level.toUpperCase().padEnd(5);

    let output = `${chalk.dim(`[${time}]`)} ${color(level)} ${entry.message}`;

    // Context as key=value pairs, not as JSON
    if (entry.context) {
      const contextStr = Object.entries(entry.context)
        .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
        .join(' ');
      output += chalk.dim(` (${contextStr})`);
    }

    if (entry.error) {
      output += `\n  ${chalk.red(`Error: ${entry.error.message}`)}`;
      if (entry.error.stack && this.isLevelEnabled('debug')) {
        const stackLines = entry.error.stack.split('\n').slice(1, 4); // First 3 stack frames
        output += `\n${chalk.dim(stackLines.join('\n'))}`;
      }
    }

    return output;
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry = this.createEntry(level, message, context, error);
    const line = this.config.format === 'json' ? this.formatAsJson(entry) : this.formatForTerminal(entry);
    this.sink(entry, line);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  /**
   * Log error message
   *
   * @param error - Error object (optional)
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.write('error', message, context, error);
  }

  /**
   * Log fatal error (usually the process exits afterwards)
   */
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.write('fatal', message, context, error);
  }
}

/**
 * Logger that discards everything (library default when the caller passes none)
 */
export function createSilentLogger(): StructuredLogger {
  return new StructuredLogger({ minLevel: 'fatal', sink: () => undefined });
}
