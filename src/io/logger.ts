import chalk from 'chalk';

import { LogLevel } from '../models';

export interface LoggerOptions {
  level?: LogLevel;
  logMethod?: (level: LogLevel, ...params: unknown[]) => void;
}

export class Logger {
  constructor(readonly options: LoggerOptions = {}) {}

  get level(): LogLevel {
    return this.options.level ?? LogLevel.info;
  }

  setLevel(level: LogLevel | undefined): void {
    if (level !== undefined) {
      this.options.level = level;
    }
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  private writeLog(level: LogLevel, params: unknown[]) {
    if (!this.isEnabled(level)) {
      return;
    }
    if (this.options.logMethod) {
      this.options.logMethod(level, ...params);
      return;
    }
    switch (level) {
      case LogLevel.trace:
      case LogLevel.debug:
        console.debug(...params.map(param => (typeof param === 'string' ? chalk.gray(param) : param)));
        break;
      case LogLevel.warn:
        console.warn(...params.map(param => (typeof param === 'string' ? chalk.yellow(param) : param)));
        break;
      case LogLevel.error:
        console.error(...params.map(param => (typeof param === 'string' ? chalk.red(param) : param)));
        break;
      default:
        console.info(...params);
        break;
    }
  }

  info(...params: unknown[]): void {
    this.writeLog(LogLevel.info, params);
  }

  log(...params: unknown[]): void {
    this.writeLog(LogLevel.info, params);
  }

  trace(...params: unknown[]): void {
    this.writeLog(LogLevel.trace, params);
  }

  debug(...params: unknown[]): void {
    this.writeLog(LogLevel.debug, params);
  }

  error(...params: unknown[]): void {
    this.writeLog(LogLevel.error, params);
  }

  warn(...params: unknown[]): void {
    this.writeLog(LogLevel.warn, params);
  }
}

export const log = new Logger({ level: LogLevel.info });
