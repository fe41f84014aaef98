/**
 * Levelled logging for installer-integrity
 *
 * Human-readable by default, one JSON object per line when
 * INSTALLER_INTEGRITY_LOG_JSON=true. Everything goes to stderr so that
 * stdout carries only the report or the --json result.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogRecord {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details (if applicable) */
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Where formatted lines go (default: stderr) */
  write?: (line: string) => void;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Log level numeric values for comparison
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const ENV_LOG_LEVEL = 'INSTALLER_INTEGRITY_LOG_LEVEL';
export const ENV_LOG_JSON = 'INSTALLER_INTEGRITY_LOG_JSON';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVEL_VALUES, value);
}

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private config: Required<LoggerConfig>;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      write: config.write ?? ((line: string) => console.error(line)),
    };
  }

  /**
   * Check if a log level should be output
   */
  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createRecord(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogRecord {
    const record: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (context && Object.keys(context).length > 0) {
      record.context = context;
    }

    if (error) {
      record.error = { name: error.name, message: error.message, stack: error.stack };
    }

    return record;
  }

  /**
   * Format a record for output
   */
  format(record: LogRecord): string {
    if (this.config.json) {
      return JSON.stringify(record);
    }

    const parts: string[] = [];
    if (this.config.timestamps) {
      parts.push(`[${record.timestamp}]`);
    }
    parts.push(`[${record.level.toUpperCase()}]`);
    parts.push(record.message);

    if (record.context) {
      parts.push(JSON.stringify(record.context));
    }
    if (record.error) {
      parts.push(`\n  Error: ${record.error.name}: ${record.error.message}`);
    }
    return parts.join(' ');
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.shouldLog(level)) return;
    this.config.write(this.format(this.createRecord(level, message, context, error)));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Update logger configuration
   */
  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

const envLevel = process.env[ENV_LOG_LEVEL];

/**
 * Default logger instance
 */
export const logger = new Logger({
  level: isLogLevel(envLevel) ? envLevel : undefined,
  json: process.env[ENV_LOG_JSON] === 'true',
});

/**
 * Create a new logger with custom configuration
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return new Logger(config);
}
