/**
 * Logging utility using winston
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import fs from 'fs';
import path from 'path';
import type { ILogger } from '@gpgpipe/core';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerOptions {
  level?: LogLevel;
  /**
   * Write rotating log files next to the console output (default: true unless
   * GPGPIPE_FILE_LOGGING=false)
   */
  fileLogging?: boolean;
}

export class Logger implements ILogger {
  private logger: winston.Logger;
  private fileLoggingEnabled = false;
  private fileTransports: winston.transport[] = [];

  constructor(logDir = '.gpgpipe/logs', options: LoggerOptions = {}) {
    const absoluteLogDir = path.resolve(process.cwd(), logDir);
    const wantsFiles = options.fileLogging ?? process.env.GPGPIPE_FILE_LOGGING !== 'false';

    if (wantsFiles) {
      try {
        if (!fs.existsSync(absoluteLogDir)) {
          fs.mkdirSync(absoluteLogDir, { recursive: true });
        }
        this.fileLoggingEnabled = true;
      } catch (error) {
        console.warn(
          `[Logger] Could not create ${absoluteLogDir}, logging to the console only: ` +
            String(error)
        );
      }
    }

    const transports: winston.transport[] = [createConsoleTransport()];

    if (this.fileLoggingEnabled) {
      this.fileTransports.push(
        new DailyRotateFile({
          dirname: absoluteLogDir,
          filename: '%DATE%-error.log',
          datePattern: 'YYYYMMDD',
          level: 'error',
          maxSize: '10m',
          maxFiles: '30d',
          zippedArchive: true,
        }),
        new DailyRotateFile({
          dirname: absoluteLogDir,
          filename: '%DATE%.log',
          datePattern: 'YYYYMMDD',
          maxSize: '10m',
          maxFiles: '30d',
          zippedArchive: true,
        })
      );
      transports.push(...this.fileTransports);
    }

    this.logger = winston.createLogger({
      level: options.level ?? process.env.LOG_LEVEL ?? 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports,
    });
  }

  get writesFiles(): boolean {
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

  setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  disableFileLogging(): void {
    for (const transport of this.fileTransports) {
      this.logger.remove(transport);
    }
    this.fileTransports = [];
    this.fileLoggingEnabled = false;
  }
}

/**
 * Colorized console output; every level goes to stderr since stdout is reserved for command output
 */
export function createConsoleTransport() {
  return new winston.transports.Console({
    stderrLevels: LOG_LEVELS,
    format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
  });
}

// Singleton instance
export const logger = new Logger();
