// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MODULE — Structured Logs with Operation Correlation
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig, type CatalogConfig } from '../config/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogFormat = 'pretty' | 'json';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  operationId?: string;
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
  operationId?: string;
  component?: string;
}

export interface LoggerSettings {
  minLevel: LogLevel;
  format: LogFormat;
  /** Line sink, console.log unless overridden */
  write: (line: string) => void;
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

/**
 * Logger settings implied by a validated config.
 */
export function settingsFromConfig(config: CatalogConfig): LoggerSettings {
  return {
    minLevel: config.logging.level,
    format: config.logging.format ?? (config.environment === 'production' ? 'json' : 'pretty'),
    write: line => console.log(line),
  };
}

// The environment is read only when the caller leaves a setting out.
function resolveSettings(settings: Partial<LoggerSettings>): LoggerSettings {
  const { minLevel, format, write } = settings;
  if (minLevel && format && write) {
    return { minLevel, format, write };
  }
  const defaults = settingsFromConfig(loadConfig());
  return {
    minLevel: minLevel ?? defaults.minLevel,
    format: format ?? defaults.format,
    write: write ?? defaults.write,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class Logger {
  private readonly context: LogContext;
  private readonly settings: LoggerSettings;

  constructor(context: LogContext = {}, settings: Partial<LoggerSettings> = {}) {
    this.context = context;
    this.settings = resolveSettings(settings);
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
    if (this.settings.format === 'json') {
      this.settings.write(JSON.stringify(entry));
      return;
    }

    const operation = entry.operationId ? `[${entry.operationId.slice(0, 8)}]` : '';
    const component = entry.component ? `[${entry.component}]` : '';
    const duration = entry.duration !== undefined ? ` ${entry.duration}ms` : '';

    const levelColors: Record<LogLevel, string> = {
      debug: '\x1b[36m', // cyan
      info: '\x1b[32m',  // green
      warn: '\x1b[33m',  // yellow
      error: '\x1b[31m', // red
      fatal: '\x1b[35m', // magenta
    };
    const reset = '\x1b[0m';
    const color = levelColors[entry.level];

    this.settings.write(
      `${entry.timestamp} ${color}${entry.level.toUpperCase().padEnd(5)}${reset} ${operation}${component} ${entry.message}${duration}`
    );

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      this.settings.write(`   ${JSON.stringify(entry.metadata)}`);
    }

    if (entry.error) {
      this.settings.write(`  Error: ${entry.error.name}: ${entry.error.message}`);
    }
  }

  private log(level: LogLevel, message: string, extra?: Partial<LogEntry>): void {
    if (!shouldLog(level, this.settings.minLevel)) return;
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

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('error', message, {
      metadata,
      error: error ? {
        name: error.name,
        message: error.message,
        stack: error.stack,
      } : undefined,
    });
  }

  fatal(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('fatal', message, {
      metadata,
      error: error ? {
        name: error.name,
        message: error.message,
        stack: error.stack,
      } : undefined,
    });
  }

  // Request timing
  time(message: string, startTime: number, metadata?: Record<string, unknown>): void {
    this.log('debug', message, { duration: Date.now() - startTime, metadata });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.settings.minLevel);
  }

  // Child logger sharing this logger's settings
  child(context: Partial<LogContext>): Logger {
    return new Logger({ ...this.context, ...context }, this.settings);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SINGLETON ROOT LOGGER
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: Logger | null = null;

export function getLogger(context?: LogContext): Logger {
  if (!rootLogger) {
    rootLogger = new Logger();
  }
  if (context) {
    return rootLogger.child(context);
  }
  return rootLogger;
}

// Component-specific loggers
export const loggers = {
  http: () => getLogger({ component: 'http' }),
  catalog: () => getLogger({ component: 'catalog' }),
  resolver: () => getLogger({ component: 'resolver' }),
};
