// logger.ts - Centralized logging utility for the check library
import * as fs from 'fs';
import * as path from 'path';
import { sanitizeLogData, sanitizeLogText } from '../security';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  CRITICAL = 4
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'critical';

// The subset of Logger that checks, clients and services depend on
export interface LoggerLike {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown, error?: unknown): void;
  error(message: string, error?: unknown, data?: unknown): void;
}

export class Logger implements LoggerLike {
  private logFile: string | null;
  private component: string;
  private minLevel: LogLevel;
  private maxFileSize: number = 10 * 1024 * 1024; // 10MB
  private maxFiles: number = 5;

  constructor(component: string, logDir?: string, minLevel: LogLevel = LogLevel.INFO) {
    this.component = component;
    this.minLevel = minLevel;

    if (logDir) {
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      this.logFile = path.join(logDir, `${component}.log`);
      this.rotateLogsIfNeeded();
    } else {
      this.logFile = null;
    }
  }

  private rotateLogsIfNeeded(): void {
    if (!this.logFile) return;

    try {
      if (!fs.existsSync(this.logFile)) {
        return;
      }

      const stats = fs.statSync(this.logFile);

      if (stats.size >= this.maxFileSize) {
        for (let i = this.maxFiles - 1; i > 0; i--) {
          const oldFile = `${this.logFile}.${i}`;
          const newFile = `${this.logFile}.${i + 1}`;

          if (fs.existsSync(oldFile)) {
            if (i === this.maxFiles - 1) {
              fs.unlinkSync(oldFile); // Delete oldest
            } else {
              fs.renameSync(oldFile, newFile);
            }
          }
        }

        fs.renameSync(this.logFile, `${this.logFile}.1`);
      }
    } catch (error) {
      console.error('Error rotating logs:', error);
    }
  }

  formatMessage(level: LogLevel, message: string, data?: unknown, error?: unknown): string {
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level];

    let logLine = `[${timestamp}] [${levelName}] [${this.component}] ${sanitizeLogText(message)}`;

    if (data !== undefined) {
      logLine += `\n  Data: ${JSON.stringify(sanitizeLogData(data), null, 2)}`;
    }

    if (error !== undefined) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logLine += `\n  Error: ${sanitizeLogText(errorMessage)}`;
      // Stack traces only for ERROR and above
      if (error instanceof Error && error.stack && level >= LogLevel.ERROR) {
        logLine += `\n  Stack: ${sanitizeLogText(error.stack)}`;
      }
    }

    return logLine + '\n';
  }

  private writeLog(level: LogLevel, message: string, data?: unknown, error?: unknown): void {
    if (level < this.minLevel) {
      return;
    }

    const logMessage = this.formatMessage(level, message, data, error);

    if (level >= LogLevel.WARN) {
      console.error(logMessage.trim());
    } else {
      console.log(logMessage.trim());
    }

    if (!this.logFile) return;

    try {
      fs.appendFileSync(this.logFile, logMessage);
      this.rotateLogsIfNeeded();
    } catch (err) {
      console.error('Failed to write log:', err);
    }
  }

  public debug(message: string, data?: unknown): void {
    this.writeLog(LogLevel.DEBUG, message, data);
  }

  public info(message: string, data?: unknown): void {
    this.writeLog(LogLevel.INFO, message, data);
  }

  public warn(message: string, data?: unknown, error?: unknown): void {
    this.writeLog(LogLevel.WARN, message, data, error);
  }

  public error(message: string, error?: unknown, data?: unknown): void {
    this.writeLog(LogLevel.ERROR, message, data, error);
  }

  public critical(message: string, error?: unknown, data?: unknown): void {
    this.writeLog(LogLevel.CRITICAL, message, data, error);
  }
}

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  critical: LogLevel.CRITICAL,
};

export function parseLogLevel(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

export function createLogger(component: string, options: { dir?: string; level: LogLevelName }): Logger {
  return new Logger(component, options.dir, parseLogLevel(options.level));
}

export default Logger;
