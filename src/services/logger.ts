import winston from 'winston';

import { config } from '../config/index.js';

const prettyFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.simple()
);

const logger = winston.createLogger({
  level: config.logging.level,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: config.service.name },
  transports: [
    new winston.transports.Console({
      // stdout belongs to the embedding scanner
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      ...(config.logging.format === 'pretty' ? { format: prettyFormat } : {}),
    }),
  ],
});

export function logInfo(message: string, meta?: Record<string, unknown>): void {
  if (config.logging.enabled) logger.info(message, meta);
}

export function logWarn(message: string, meta?: Record<string, unknown>): void {
  if (config.logging.enabled) logger.warn(message, meta);
}

export function logDebug(
  message: string,
  meta?: Record<string, unknown>
): void {
  if (config.logging.enabled) logger.debug(message, meta);
}

export function logError(
  message: string,
  error?: Error | Record<string, unknown>
): void {
  if (!config.logging.enabled) return;

  const errorMeta =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : error;
  logger.error(message, errorMeta);
}
