/**
 * Logging infrastructure for sitesearch
 *
 * Structured log lines go to stderr, so stdout stays reserved for the
 * search report, and are optionally appended to a log file.
 */

import path from 'path';
import { createWriteStream, existsSync, mkdirSync } from 'fs';
import { config } from './config.js';

/**
 * Log level enumeration, most severe first
 */
export enum LogLevel {
  ERROR = 'ERROR',
  WARN = 'WARN',
  INFO = 'INFO',
  DEBUG = 'DEBUG'
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  /** Minimum log level to record */
  minLevel: LogLevel;

  /** File to append entries to; none when unset */
  logFile?: string;

  /** Whether entries are written to stderr */
  stderr: boolean;
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

export function parseLogLevel(level: string): LogLevel {
  switch (level.toLowerCase()) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    case 'debug':
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Render log metadata as a single-line suffix
 */
export function formatMetadata(metadata: unknown): string {
  if (metadata === undefined || metadata === null) {
    return '';
  }
  if (metadata instanceof Error) {
    return `${metadata.name}: ${metadata.message}`;
  }
  if (typeof metadata === 'object') {
    try {
      return JSON.stringify(metadata, (_key, value: unknown) =>
        value instanceof Error ? `${value.name}: ${value.message}` : value
      );
    } catch {
      return String(metadata);
    }
  }
  return String(metadata);
}

/**
 * Class for structured logging
 */
export class Logger {
  private static instance: Logger | undefined;
  private config: LoggerConfig;
  private fileStream: NodeJS.WritableStream | null = null;

  constructor(config: LoggerConfig) {
    this.config = config;
    this.openLogFile();
  }

  /**
   * Get the singleton logger instance, configured from the application config
   */
  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger({
        minLevel: parseLogLevel(config.logLevel),
        logFile: config.logFile,
        stderr: true
      });
    }
    return Logger.instance;
  }

  private openLogFile(): void {
    const { logFile } = this.config;
    if (!logFile) {
      return;
    }
    try {
      const dir = path.dirname(logFile);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      this.fileStream = createWriteStream(logFile, { flags: 'a' });
    } catch (error) {
      process.stderr.write(`Failed to open log file ${logFile}: ${formatMetadata(error)}\n`);
      this.fileStream = null;
    }
  }

  /**
   * Whether entries at the given level are recorded
   */
  public isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(this.config.minLevel);
  }

  /**
   * Write a log entry
   * @param context Log context (e.g., class or method name)
   */
  private writeLog(level: LogLevel, message: string, context: string, metadata?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const suffix = formatMetadata(metadata);
    const entry = `${new Date().toISOString()} [${level}] [${context}] ${message}${suffix ? ` ${suffix}` : ''}\n`;

    if (this.config.stderr) {
      process.stderr.write(entry);
    }
    if (this.fileStream) {
      this.fileStream.write(entry);
    }
  }

  public error(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.ERROR, message, context, metadata);
  }

  public warn(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.WARN, message, context, metadata);
  }

  public info(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.INFO, message, context, metadata);
  }

  public debug(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.DEBUG, message, context, metadata);
  }

  /**
   * Log an error with its stack trace
   */
  public logError(error: Error, context: string, message?: string): void {
    this.error(message || error.message, context, {
      name: error.name,
      message: error.message,
      stack: error.stack
    });
  }

  /**
   * Flush and close the log file, if any
   */
  public close(): Promise<void> {
    const stream = this.fileStream;
    this.fileStream = null;
    if (!stream) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      stream.end(() => resolve());
    });
  }
}

// Convenience function to get the logger instance
export function getLogger(): Logger {
  return Logger.getInstance();
}
