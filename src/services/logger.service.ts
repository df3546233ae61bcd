import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export interface LoggerOptions {
  level: LogLevel;
  logToConsole: boolean;
  logToFile: boolean;
  logFilePath?: string;
  scope?: string;
}

export class Logger {
  private options: LoggerOptions;
  private logFile: fs.WriteStream | null = null;
  private parent: Logger | null = null;

  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = {
      level: options.level ?? LogLevel.INFO,
      logToConsole: options.logToConsole ?? true,
      logToFile: options.logToFile ?? false,
      logFilePath: options.logFilePath,
      scope: options.scope
    };

    this.initLogFile();
  }

  private initLogFile(): void {
    if (!this.options.logToFile || !this.options.logFilePath) return;

    try {
      fs.mkdirSync(path.dirname(this.options.logFilePath), { recursive: true });
      this.logFile = fs.createWriteStream(this.options.logFilePath, { flags: 'a' });
      this.logFile.write(`\n--- Log started at ${new Date().toISOString()} ---\n`);
    } catch (error) {
      console.error(`Error creating log file at ${this.options.logFilePath}:`, error);
      this.options.logToFile = false;
    }
  }

  /**
   * Logger that prefixes every line with a scope and writes through this one.
   */
  public child(scope: string): Logger {
    const child = new Logger({ level: this.options.level, logToConsole: false, logToFile: false, scope });
    child.parent = this;
    return child;
  }

  public debug(message: string): void {
    this.log(LogLevel.DEBUG, message);
  }

  public info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  public warn(message: string): void {
    this.log(LogLevel.WARN, message);
  }

  public error(message: string): void {
    this.log(LogLevel.ERROR, message);
  }

  private log(level: LogLevel, message: string): void {
    const scoped = this.options.scope ? `[${this.options.scope}] ${message}` : message;

    if (this.parent) {
      this.parent.log(level, scoped);
      return;
    }

    if (level < this.options.level) return;

    const formattedMessage = `[${new Date().toISOString()}] ${LogLevel[level].padEnd(5)} - ${scoped}`;

    if (this.options.logToConsole) {
      this.getConsoleMethod(level)(formattedMessage);
    }

    if (this.options.logToFile && this.logFile) {
      this.logFile.write(formattedMessage + '\n');
    }
  }

  private getConsoleMethod(level: LogLevel): (message: string) => void {
    switch (level) {
      case LogLevel.DEBUG: return console.debug;
      case LogLevel.INFO: return console.info;
      case LogLevel.WARN: return console.warn;
      case LogLevel.ERROR: return console.error;
      default: return console.log;
    }
  }

  public setLevel(level: LogLevel): void {
    this.options.level = level;
  }

  public close(): void {
    if (this.logFile) {
      this.logFile.write(`--- Log ended at ${new Date().toISOString()} ---\n\n`);
      this.logFile.end();
      this.logFile = null;
    }
  }
}

export function parseLogLevel(level: string): LogLevel {
  switch (level.toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    default: return LogLevel.INFO;
  }
}

/**
 * Logger that drops everything; used where a caller does not care about output.
 */
export function silentLogger(): Logger {
  return new Logger({ level: LogLevel.ERROR, logToConsole: false, logToFile: false });
}
