/**
 * @ticketdesk/core - Logger
 *
 * Centralized winston logger. Console transport only: JSON in production,
 * colourised single lines elsewhere, silent while tests run.
 */

import winston, { createLogger, format, transports } from 'winston';

const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  verbose: 4,
  debug: 5,
  trace: 6,
  system: 7
};

winston.addColors({
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'cyan',
  verbose: 'blue',
  debug: 'white',
  trace: 'gray',
  system: 'magenta'
});

export type LogLevel = keyof typeof levels;
export type LogMeta = Record<string, unknown>;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levels, value);
}

function buildLogger(): winston.Logger {
  const env = process.env.NODE_ENV || 'development';
  const requestedLevel = process.env.LOG_LEVEL || 'info';

  return createLogger({
    levels,
    level: isLogLevel(requestedLevel) ? requestedLevel : 'info',
    silent: env === 'test',
    format: format.combine(
      format.timestamp(),
      format.errors({ stack: true }),
      format.json()
    ),
    transports: [
      new transports.Console({
        format: env === 'production'
          ? format.combine(format.timestamp(), format.errors({ stack: true }), format.json())
          : format.combine(format.colorize(), format.simple())
      })
    ]
  });
}

let internalLogger: winston.Logger | null = null;

export function getWinstonLogger(): winston.Logger {
  if (!internalLogger) {
    internalLogger = buildLogger();
  }
  return internalLogger;
}

/**
 * Applies the configured level once configuration has been loaded.
 */
export function setLogLevel(level: LogLevel): void {
  getWinstonLogger().level = level;
}

const write = (level: LogLevel) => (msg: string, meta?: LogMeta): void => {
  if (meta !== undefined) {
    getWinstonLogger().log(level, msg, meta);
  } else {
    getWinstonLogger().log(level, msg);
  }
};

const logger = {
  error: write('error'),
  warn: write('warn'),
  info: write('info'),
  http: write('http'),
  verbose: write('verbose'),
  debug: write('debug'),
  trace: write('trace'),
  system: write('system'),
};

export type AppLogger = typeof logger;

export default logger;
