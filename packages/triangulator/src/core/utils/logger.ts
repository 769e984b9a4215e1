/**
 * Structured logging utility for the triangulator library
 *
 * Console-based, levelled, JSON lines by default and a single readable
 * line per entry when TRIANGULATOR_LOG_PRETTY is set. Library code takes
 * any `LoggerLike` so the CLI can hand in its own logger.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Minimal logger surface accepted by library functions
 */
export interface LoggerLike {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
}

export const LOG_LEVEL_VALUES: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

class Logger implements LoggerLike {
  constructor(private readonly config: LoggerConfig) {}

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (LOG_LEVEL_VALUES[level] < LOG_LEVEL_VALUES[this.config.level]) return;

    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    const line = this.config.pretty
      ? `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${
          hasMetadata ? ` ${JSON.stringify(metadata)}` : ''
        }`
      : JSON.stringify({
          timestamp,
          level,
          service: this.config.service,
          message,
          ...(hasMetadata ? metadata : {}),
        });

    // stdout stays reserved for command output
    console.error(line);
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }
}

const getLogLevel = (): LogLevel => {
  const level = process.env.TRIANGULATOR_LOG_LEVEL?.toLowerCase();
  return isLogLevel(level) ? level : 'warn';
};

const isPretty = (): boolean => {
  const value = process.env.TRIANGULATOR_LOG_PRETTY;
  return value === '1' || value?.toLowerCase() === 'true';
};

/**
 * Create a logger scoped to a module
 */
export function createLogger(module: string): LoggerLike {
  return new Logger({
    level: getLogLevel(),
    service: `country-triangulator:${module}`,
    pretty: isPretty(),
  });
}
