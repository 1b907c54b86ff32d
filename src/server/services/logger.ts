import chalk from 'chalk';
import { createLogger, format, transports, type Logger as WinstonLogger } from 'winston';
import path from 'path';
import fs from 'fs';
import { env } from '../../config/env.js';
import { getAppDataDir } from '../../config/paths.js';
const { combine, timestamp, printf, errors } = format;

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug'
}

interface LogMessage {
  level: LogLevel;
  message: string;
  context?: string;
  error?: unknown;
}

// Parse command line arguments
const args = process.argv.slice(2);
const isDebug = args.includes('-d') || args.includes('--debug');
const isVerbose = args.includes('-v') || args.includes('--verbose');
const envDebug = env.DEBUG === '1' || env.VERBOSE === '1';
const isTest = env.NODE_ENV === 'test';

const levelRank: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3
};

function isLogLevel(value: string): value is LogLevel {
  return value in levelRank;
}

// Custom console format
const customFormat = printf(({ level, message, timestamp: ts, context, error }) => {
  const colors: Record<LogLevel, typeof chalk.red> = {
    [LogLevel.ERROR]: chalk.red,
    [LogLevel.WARN]: chalk.yellow,
    [LogLevel.INFO]: chalk.green,
    [LogLevel.DEBUG]: chalk.gray
  };

  const color = isLogLevel(level) ? colors[level] : chalk.white;
  const contextStr = context ? chalk.cyan(`[${String(context)}] `) : '';
  const timestampStr = new Date(String(ts)).toISOString();

  let output = `${timestampStr} ${color(level.toUpperCase().padEnd(5))} ${contextStr}${String(message)}`;

  if (error instanceof Error) {
    output += `\n${chalk.red(error.stack ?? error.message)}`;
  } else if (error !== undefined) {
    output += ` ${chalk.red(String(error))}`;
  }

  return output;
});

// File format (no colors)
const fileFormat = combine(timestamp(), errors({ stack: true }), format.json());

export class Logger {
  private logger: WinstonLogger;
  private currentLevel: LogLevel;
  readonly logDir: string | null;

  constructor(logDir: string | null = isTest ? null : path.join(getAppDataDir(), 'logs')) {
    const requested = env.LOG_LEVEL;
    if (isDebug || isVerbose || envDebug) {
      this.currentLevel = LogLevel.DEBUG;
    } else {
      this.currentLevel = requested && isLogLevel(requested) ? requested : LogLevel.INFO;
    }
    this.logDir = logDir && this.prepareLogDir(logDir) ? logDir : null;

    const fileTransports = this.logDir
      ? [
          new transports.File({
            filename: path.join(this.logDir, 'error.log'),
            level: 'error',
            format: fileFormat
          }),
          new transports.File({
            filename: path.join(this.logDir, 'combined.log'),
            format: fileFormat
          })
        ]
      : [];

    this.logger = createLogger({
      level: this.currentLevel,
      silent: isTest,
      format: combine(timestamp(), errors({ stack: true }), customFormat),
      transports: [new transports.Console({ stderrLevels: ['error', 'warn'] }), ...fileTransports]
    });

    this.debug(`Logger initialized${this.logDir ? ` (files in ${this.logDir})` : ''}`, 'Logger');
  }

  private prepareLogDir(dir: string): boolean {
    try {
      fs.mkdirSync(dir, { recursive: true });
      fs.accessSync(dir, fs.constants.W_OK);
      return true;
    } catch (err) {
      console.error(chalk.red(`Cannot write to log directory ${dir}, logging to console only: ${String(err)}`));
      return false;
    }
  }

  setLevel(level: LogLevel | string) {
    const normalized = level.toLowerCase();
    if (!isLogLevel(normalized)) {
      this.warn(`Ignoring unknown log level ${level}`, 'Logger');
      return;
    }
    this.currentLevel = normalized;
    this.logger.level = this.currentLevel;
    this.debug(`Log level set to ${this.currentLevel}`, 'Logger');
  }

  shouldLog(level: LogLevel): boolean {
    return levelRank[level] <= levelRank[this.currentLevel];
  }

  log(logData: LogMessage) {
    if (!this.shouldLog(logData.level)) return;

    this.logger.log({
      level: logData.level,
      message: logData.message,
      context: logData.context,
      error: logData.error
    });
  }

  error(message: string, context?: string, error?: unknown) {
    this.log({ level: LogLevel.ERROR, message, context, error });
  }

  warn(message: string, context?: string, error?: unknown) {
    this.log({ level: LogLevel.WARN, message, context, error });
  }

  info(message: string, context?: string) {
    this.log({ level: LogLevel.INFO, message, context });
  }

  debug(message: string, context?: string) {
    this.log({ level: LogLevel.DEBUG, message, context });
  }
}

// Singleton logger instance
export const logger = new Logger();
