/**
 * @ticketdesk/core
 *
 * Shared infrastructure: logging, the application error taxonomy and
 * environment configuration.
 */

export { default as logger, getWinstonLogger, setLogLevel, isLogLevel } from './lib/logger';
export type { AppLogger, LogLevel, LogMeta } from './lib/logger';

export {
  AppError,
  BadRequestError,
  ValidationError,
  UnauthorizedError,
  ForbiddenError,
  NotFoundError,
  ConfigurationError,
  isAppError,
} from './lib/errors';

export { loadConfig } from './lib/config';
export type { AppConfig, DatabaseSettings } from './lib/config';
