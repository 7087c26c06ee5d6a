/**
 * Pino logger factory shared by the API server and the ingest CLI.
 *
 * The same options feed Fastify's request logger, so both streams share
 * level, redaction and pretty-printing.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

import type { AppConfig } from '../config/index.js';

export type LogLevel = AppConfig['logger']['level'];

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

/** Connection strings carry credentials */
export const REDACTED_PATHS = ['config.database.url', 'database.url', 'databaseUrl'];

const prettyTransport = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
  },
};

/**
 * Pino options for a named process logger.
 */
export const buildLoggerOptions = (config: LoggerConfig): LoggerOptions => ({
  name: config.name,
  level: config.level,
  redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  ...(config.pretty === true && { transport: prettyTransport }),
});

export const createLogger = (config: LoggerConfig): Logger => pinoLib(buildLoggerOptions(config));

export const createChildLogger = (parent: Logger, context: Record<string, unknown>): Logger =>
  parent.child(context);

export { type Logger } from 'pino';
