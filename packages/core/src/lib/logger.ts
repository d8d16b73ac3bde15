/**
 * Winston-backed logger with the custom level set used across the helpdesk packages.
 *
 * Console output is always on. File output (combined and error-only, rotated daily)
 * is added when file logging is enabled in configuration.
 */
import path from 'node:path';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { loadConfig, type LogLevel } from './config';

const levels: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  verbose: 4,
  debug: 5,
  trace: 6,
  system: 7,
};

const colors: Record<LogLevel, string> = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  verbose: 'cyan',
  debug: 'blue',
  trace: 'gray',
  system: 'white',
};

winston.addColors(colors);

export type LogMeta = Record<string, unknown>;

export type AppLogger = {
  [Level in LogLevel]: (message: string, meta?: LogMeta) => void;
};

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  fileLogging?: boolean;
  dirPath?: string;
  /** Extra transports, mainly for tests that capture output. */
  transports?: winston.transport[];
}

const consoleFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} [${level}]: ${String(message)}${extra}`;
});

export function buildTransports(options: LoggerOptions): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: options.json
        ? winston.format.json()
        : winston.format.combine(winston.format.colorize(), consoleFormat),
    }),
  ];

  if (options.fileLogging) {
    const dir = options.dirPath ?? './logs';
    transports.push(
      new DailyRotateFile({
        filename: path.join(dir, 'combined-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        maxFiles: '14d',
        format: winston.format.json(),
      }),
      new DailyRotateFile({
        filename: path.join(dir, 'error-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        maxFiles: '30d',
        format: winston.format.json(),
      }),
    );
  }

  return [...transports, ...(options.transports ?? [])];
}

export function createWinstonLogger(options: LoggerOptions = {}): winston.Logger {
  return winston.createLogger({
    levels,
    level: options.level ?? 'info',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
    ),
    transports: buildTransports(options),
  });
}

function wrap(instance: winston.Logger): AppLogger {
  const log = (level: LogLevel) => (message: string, meta?: LogMeta) => {
    if (meta !== undefined) {
      instance.log(level, message, meta);
    } else {
      instance.log(level, message);
    }
  };

  return {
    error: log('error'),
    warn: log('warn'),
    info: log('info'),
    http: log('http'),
    verbose: log('verbose'),
    debug: log('debug'),
    trace: log('trace'),
    system: log('system'),
  };
}

export function createLogger(options: LoggerOptions = {}): AppLogger {
  return wrap(createWinstonLogger(options));
}

let defaultLogger: AppLogger | undefined;

function getDefaultLogger(): AppLogger {
  if (!defaultLogger) {
    const { logging } = loadConfig();
    defaultLogger = createLogger({
      level: logging.level,
      json: logging.json,
      fileLogging: logging.fileLogging,
      dirPath: logging.dirPath,
    });
  }
  return defaultLogger;
}

/**
 * Process-wide logger. Created on first use from the environment configuration.
 */
const logger: AppLogger = {
  error: (message, meta) => getDefaultLogger().error(message, meta),
  warn: (message, meta) => getDefaultLogger().warn(message, meta),
  info: (message, meta) => getDefaultLogger().info(message, meta),
  http: (message, meta) => getDefaultLogger().http(message, meta),
  verbose: (message, meta) => getDefaultLogger().verbose(message, meta),
  debug: (message, meta) => getDefaultLogger().debug(message, meta),
  trace: (message, meta) => getDefaultLogger().trace(message, meta),
  system: (message, meta) => getDefaultLogger().system(message, meta),
};

export default logger;
