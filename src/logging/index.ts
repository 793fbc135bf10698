// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MODULE — Structured Logs with Component Context
// ═══════════════════════════════════════════════════════════════════════════════
//
// Everything goes to stderr: stdout belongs to the answers printed by the
// session loop.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { readEnvironment, safeValidateConfig } from '../config/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  requestId?: string;
  component?: string;
  duration?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LogContext {
  requestId?: string;
  component?: string;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  json?: boolean;
  /** Defaults to console.error */
  sink?: (line: string) => void;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOG LEVELS
// ─────────────────────────────────────────────────────────────────────────────────

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel];
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m',  // green
  warn: '\x1b[33m',  // yellow
  error: '\x1b[31m', // red
  fatal: '\x1b[35m', // magenta
};
const RESET = '\x1b[0m';

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class Logger {
  private readonly context: LogContext;
  private readonly minLevel: LogLevel;
  private readonly jsonFormat: boolean;
  private readonly sink: (line: string) => void;

  constructor(context: LogContext = {}, options: LoggerOptions = {}) {
    this.context = context;
    this.minLevel = options.minLevel ?? 'info';
    this.jsonFormat = options.json ?? false;
    this.sink = options.sink ?? ((line) => console.error(line));
  }

  private formatEntry(level: LogLevel, message: string, extra?: Partial<LogEntry>): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...extra,
    };
  }

  private output(entry: LogEntry): void {
    if (this.jsonFormat) {
      this.sink(JSON.stringify(entry));
      return;
    }

    const prefix = entry.requestId ? `[${entry.requestId.slice(0, 8)}]` : '';
    const component = entry.component ? `[${entry.component}]` : '';
    const duration = entry.duration !== undefined ? ` ${entry.duration}ms` : '';
    const color = LEVEL_COLORS[entry.level];

    this.sink(
      `${entry.timestamp} ${color}${entry.level.toUpperCase().padEnd(5)}${RESET} ${prefix}${component} ${entry.message}${duration}`
    );

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      this.sink(`   ${JSON.stringify(entry.metadata)}`);
    }

    if (entry.error) {
      this.sink(`  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        this.sink(`   ${entry.error.stack.split('\n').slice(1, 4).join('\n  ')}`);
      }
    }
  }

  private log(level: LogLevel, message: string, extra?: Partial<LogEntry>): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.output(this.formatEntry(level, message, extra));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // PUBLIC API
  // ─────────────────────────────────────────────────────────────────────────────

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, { metadata });
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, { metadata });
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, { metadata });
  }

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.log('error', message, { metadata, error: describeError(error) });
  }

  fatal(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    this.log('fatal', message, { metadata, error: describeError(error) });
  }

  // Request timing
  time(message: string, startTime: number, metadata?: Record<string, unknown>): void {
    const duration = Date.now() - startTime;
    this.log('info', message, { duration, metadata });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.minLevel);
  }

  // Create child logger with additional context
  child(context: Partial<LogContext>): Logger {
    return new Logger(
      { ...this.context, ...context },
      { minLevel: this.minLevel, json: this.jsonFormat, sink: this.sink }
    );
  }
}

function describeError(error: unknown): LogEntry['error'] {
  if (error === undefined) return undefined;
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'NonError', message: String(error) };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SINGLETON ROOT LOGGER
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: Logger | null = null;

/**
 * Loggers are created at import time, before entry points can report a bad
 * configuration. An invalid environment falls back to the default level and
 * format here and is reported by `loadConfig()` instead.
 */
function rootOptions(): LoggerOptions {
  const parsed = safeValidateConfig(readEnvironment());
  if (!parsed.success) {
    return { minLevel: 'warn' };
  }
  return {
    minLevel: parsed.data.logging.level,
    json: parsed.data.logging.format === 'json',
  };
}

export function getLogger(context?: LogContext): Logger {
  if (!rootLogger) {
    rootLogger = new Logger({}, rootOptions());
  }
  if (context) {
    return rootLogger.child(context);
  }
  return rootLogger;
}

/**
 * Replace the root logger (tests, or callers that want a different sink).
 */
export function setRootLogger(logger: Logger | null): void {
  rootLogger = logger;
}
