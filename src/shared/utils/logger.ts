/**
 * Logging utility using winston
 *
 * Every console level goes to stderr. stdout belongs to the tool protocol
 * (schema JSON or the plain-text result) and must carry nothing else.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import fs from 'fs';
import path from 'path';
import { loadLoggerConfig, LogLevelSchema } from '../config/schemas.js';
import type { LogLevel, LoggerConfig } from '../config/schemas.js';

/** One `level: message` line per entry, metadata appended as JSON */
export const consoleFormat = winston.format.simple();

/** Timestamped JSON for the rotated log files */
export const fileFormat = winston.format.combine(winston.format.timestamp(), winston.format.json());

export function createConsoleTransport(): winston.transport {
  return new winston.transports.Console({
    stderrLevels: [...LogLevelSchema.options],
    format: consoleFormat,
  });
}

export class Logger {
  private logger: winston.Logger;
  private fileLoggingEnabled = false;

  constructor(
    options: Partial<LoggerConfig> = {},
    consoleTransport: winston.transport = createConsoleTransport()
  ) {
    const transports: winston.transport[] = [consoleTransport];

    if (options.logDir) {
      const absoluteLogDir = path.resolve(process.cwd(), options.logDir);

      // Degrade to console-only logging when the directory can't be created
      try {
        if (!fs.existsSync(absoluteLogDir)) {
          fs.mkdirSync(absoluteLogDir, { recursive: true });
        }
        this.fileLoggingEnabled = true;
      } catch (error) {
        console.warn(
          `[Logger] Warning: Failed to create log directory at ${absoluteLogDir}. File logging disabled. Error: ${error}`
        );
      }

      if (this.fileLoggingEnabled) {
        transports.push(
          new DailyRotateFile({
            dirname: absoluteLogDir,
            filename: '%DATE%-error.log',
            datePattern: 'YYYYMMDD',
            level: 'error',
            format: fileFormat,
            maxSize: '10m',
            maxFiles: '30d',
            zippedArchive: true,
          }),
          new DailyRotateFile({
            dirname: absoluteLogDir,
            filename: '%DATE%.log',
            datePattern: 'YYYYMMDD',
            format: fileFormat,
            maxSize: '10m',
            maxFiles: '30d',
            zippedArchive: true,
          })
        );
      }
    }

    this.logger = winston.createLogger({
      level: options.level ?? 'warn',
      format: winston.format.errors({ stack: true }),
      transports,
    });
  }

  get isFileLoggingEnabled(): boolean {
    return this.fileLoggingEnabled;
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.logger.isLevelEnabled(level);
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  /**
   * Flush and close all transports
   */
  close(): void {
    this.logger.close();
  }
}

function createDefaultLogger(): Logger {
  try {
    return new Logger(loadLoggerConfig());
  } catch (error) {
    console.warn(`[Logger] Warning: ${error instanceof Error ? error.message : String(error)}. Using defaults.`);
    return new Logger();
  }
}

// Singleton instance
export const logger = createDefaultLogger();
