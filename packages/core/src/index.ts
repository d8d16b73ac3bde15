/**
 * @deskflow/core
 *
 * Logging, error taxonomy and environment configuration shared by the helpdesk packages.
 */

export { default as logger, createLogger, createWinstonLogger, buildTransports } from './lib/logger';
export type { AppLogger, LogMeta, LoggerOptions } from './lib/logger';

export * from './lib/errors';

export { parseConfig, loadConfig, resetConfigCache, LOG_LEVELS } from './lib/config';
export type { HelpdeskConfig, LogLevel } from './lib/config';
