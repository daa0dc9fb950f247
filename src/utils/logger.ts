import winston from 'winston';
import { config } from '../config';
import { getRequestContext } from './requestContext';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom log format
const logFormat = printf(({ level, message, timestamp, ...metadata }) => {
  const ctx = getRequestContext();
  const ctxMeta: Record<string, string> = {};
  if (ctx?.requestId) ctxMeta.requestId = ctx.requestId;
  if (ctx?.cycleId) ctxMeta.cycleId = ctx.cycleId;
  const mergedMeta = { ...ctxMeta, ...metadata };

  let msg = `${timestamp} [${level}]: ${message}`;

  const metaKeys = Object.keys(mergedMeta);
  if (metaKeys.length > 0) {
    msg += ` ${JSON.stringify(mergedMeta)}`;
  }

  return msg;
});

// Create logger instance
const logger = winston.createLogger({
  level: config.logLevel,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(
        colorize(),
        logFormat
      ),
    }),
  ],
});

/**
 * Mirror log output into a file (the service's `logging.file` setting).
 */
export function addFileTransport(filename: string): void {
  logger.add(new winston.transports.File({ filename }));
}

/**
 * Apply the level from the service settings file.
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}

export default logger;
