import fs from 'fs';
import path from 'path';
import appConfig from '../config/appConfig';

enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL'
}

export interface LoggerOptions {
  logDir?: string;
  logToFile?: boolean;
  debug?: boolean;
}

export class LoggerService {
  private scope: string;
  private logDir: string;
  private logFile: string;
  private logToFileEnabled: boolean;
  private debugEnabled: boolean;

  constructor(scope: string = 'App', options: LoggerOptions = {}) {
    this.scope = scope;
    this.logDir = path.resolve(options.logDir ?? appConfig.logging.logDir);
    this.logFile = path.join(this.logDir, `app-${new Date().toISOString().split('T')[0]}.log`);
    this.logToFileEnabled = options.logToFile ?? appConfig.logging.logToFile;
    this.debugEnabled = options.debug ?? appConfig.logging.debug;

    // Ensure log directory exists
    if (this.logToFileEnabled && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  /**
   * Derive a logger that shares this one's sinks under another scope
   */
  child(scope: string): LoggerService {
    return new LoggerService(scope, {
      logDir: this.logDir,
      logToFile: this.logToFileEnabled,
      debug: this.debugEnabled,
    });
  }

  private formatMessage(level: LogLevel, message: string, meta?: unknown): string {
    const timestamp = new Date().toISOString();
    const formattedMeta = meta !== undefined ? `\n${JSON.stringify(meta, null, 2)}` : '';
    return `[${timestamp}] [${level}] [${this.scope}] ${message}${formattedMeta}`;
  }

  private logToFile(message: string): void {
    if (!this.logToFileEnabled) return;
    fs.appendFileSync(this.logFile, `${message}\n`);
  }

  private errorMeta(error: unknown, meta?: Record<string, unknown>): unknown {
    if (error === undefined) return meta;
    if (error instanceof Error) {
      return { ...meta, errorMessage: error.message, stack: error.stack };
    }
    return { ...meta, errorMessage: String(error) };
  }

  debug(message: string, meta?: unknown): void {
    if (!this.debugEnabled) return;
    const formattedMessage = this.formatMessage(LogLevel.DEBUG, message, meta);
    console.debug(formattedMessage);
    this.logToFile(formattedMessage);
  }

  info(message: string, meta?: unknown): void {
    const formattedMessage = this.formatMessage(LogLevel.INFO, message, meta);
    console.info(formattedMessage);
    this.logToFile(formattedMessage);
  }

  warn(message: string, meta?: unknown): void {
    const formattedMessage = this.formatMessage(LogLevel.WARN, message, meta);
    console.warn(formattedMessage);
    this.logToFile(formattedMessage);
  }

  error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
    const formattedMessage = this.formatMessage(LogLevel.ERROR, message, this.errorMeta(error, meta));
    console.error(formattedMessage);
    this.logToFile(formattedMessage);
  }

  fatal(message: string, error?: unknown, meta?: Record<string, unknown>): void {
    const formattedMessage = this.formatMessage(LogLevel.FATAL, message, this.errorMeta(error, meta));
    console.error(formattedMessage);
    this.logToFile(formattedMessage);
  }

  getLogPath(): string {
    return this.logFile;
  }
}

// Export a singleton instance
export const logger = new LoggerService('Server');
export default logger;
