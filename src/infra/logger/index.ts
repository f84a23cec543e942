/**
 * Logger factory using Pino
 * Provides structured JSON logging with configurable levels
 */

import pinoLib, { type Logger, type LoggerOptions, type TransportSingleOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'food-rescue-dashboard',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * pino-pretty transport shared by the root logger and the Fastify request logger.
 */
export const PRETTY_TRANSPORT: TransportSingleOptions = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
  },
};

/**
 * Builds Pino options from a partial logger config.
 */
export const makeLoggerOptions = (config: Partial<LoggerConfig> = {}): LoggerOptions => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  // Use pino-pretty in development for readable logs
  if (finalConfig.pretty === true) {
    options.transport = PRETTY_TRANSPORT;
  }

  return options;
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  return pinoLib(makeLoggerOptions(config));
};

export { type Logger } from 'pino';
