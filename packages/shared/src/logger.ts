/**
 * Structured Logger with Winston
 *
 * Features:
 * - Log levels (error, warn, info, debug)
 * - Daily rotated JSON log files, with errors in a file of their own
 * - Colourised console output
 * - Context injection through child loggers (session, side, tick...)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerConfig {
  /** Service name (simulator, cli) */
  service: string;
  /** Log level */
  level?: LogLevel;
  /** Enable console output */
  console?: boolean;
  /** Enable file logging */
  file?: boolean;
  /** Log directory, defaults to logs/<service> under the working directory */
  logDir?: string;
}

export interface LogContext {
  [key: string]: unknown;
}

/**
 * Logger class with structured logging
 */
export class Logger {
  private constructor(
    private readonly logger: winston.Logger,
    private readonly service: string
  ) {}

  static create(config: LoggerConfig): Logger {
    const logDir = config.logDir ?? path.join(process.cwd(), 'logs', config.service);
    if (config.file !== false) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    const fileFormat = winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'service'] }),
      winston.format.json()
    );

    const consoleFormat = winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${metaStr}`;
      })
    );

    const transports: winston.transport[] = [];

    if (config.console !== false) {
      // Console goes to stderr so an interactive prompt on stdout stays readable
      transports.push(
        new winston.transports.Console({
          format: consoleFormat,
          stderrLevels: [...LOG_LEVELS],
        })
      );
    }

    if (config.file !== false) {
      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${config.service}-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          format: fileFormat,
        })
      );

      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${config.service}-error-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '30d',
          level: 'error',
          format: fileFormat,
        })
      );
    }

    // winston warns when a logger has nowhere to write
    if (transports.length === 0) {
      transports.push(new winston.transports.Console({ silent: true }));
    }

    const logger = winston.createLogger({
      level: config.level ?? 'info',
      defaultMeta: { service: config.service },
      transports,
    });

    return new Logger(logger, config.service);
  }

  error(message: string, context?: LogContext): void {
    this.logger.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.logger.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.log('debug', message, context);
  }

  getService(): string {
    return this.service;
  }

  /**
   * Create child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger(this.logger.child(context), this.service);
  }

  /**
   * Close logger and flush logs
   */
  async close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.on('finish', () => resolve());
      this.logger.end();
    });
  }
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  return Logger.create(config);
}

/**
 * Logger that writes nowhere, for library defaults and tests
 */
export function createSilentLogger(service = 'silent'): Logger {
  return Logger.create({ service, console: false, file: false });
}

/**
 * Narrow an arbitrary string to a log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
