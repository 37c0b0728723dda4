import winston from 'winston';
import { resolveConfig } from '../config/env';
import { isPuzzleDebugEnabled } from './envFlags';

export type LogMeta = Record<string, unknown>;

const { config, errors: configErrors } = resolveConfig();

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = 'sliding-puzzle';
  }

  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  return info;
});

/**
 * Format for structured JSON logging.
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  })
);

const logger = winston.createLogger({
  level: isPuzzleDebugEnabled() ? 'debug' : config.logging.level,
  defaultMeta: {
    service: 'sliding-puzzle',
    environment: config.nodeEnv,
  },
  silent: config.nodeEnv === 'test',
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
    }),
  ],
});

if (configErrors.length > 0) {
  logger.warn('Invalid environment configuration, using defaults', { errors: configErrors });
}

export { logger };
