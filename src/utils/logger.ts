import winston from 'winston';
import { config } from '../config/index.js';

const { combine, timestamp, errors, json, printf, colorize } = winston.format;

// Custom format for development
const devFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }
  return msg;
});

const logger = winston.createLogger({
  level: config.logging.level,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })
  ),
  defaultMeta: { service: config.logging.serviceName },
  transports: [],
});

if (config.isDevelopment) {
  logger.add(new winston.transports.Console({
    format: combine(
      colorize(),
      devFormat
    ),
  }));
} else {
  logger.add(new winston.transports.Console({
    format: combine(json()),
    silent: config.isTest,
  }));
}

// Helper functions for structured logging
export function logError(message: string, error: Error, metadata?: Record<string, unknown>): void {
  logger.error(message, {
    error: {
      message: error.message,
      stack: error.stack,
      name: error.name,
    },
    ...metadata,
  });
}

export function logDebug(message: string, metadata?: Record<string, unknown>): void {
  logger.debug(message, metadata);
}
