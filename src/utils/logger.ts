import winston from 'winston';
import { config } from '../config';

type LogMetadata = Record<string, unknown>;

// Create Winston logger
const winstonLogger = winston.createLogger({
  level: config.LOG_LEVEL || 'info',
  silent: config.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: config.SERVICE_NAME },
  transports: [
    // Console transport
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp, ...metadata }) => {
          let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
          if (Object.keys(metadata).length > 0 && metadata['service'] !== undefined) {
            msg += ` ${JSON.stringify(metadata)}`;
          }
          return msg;
        })
      ),
    }),
  ],
});

function describeError(error: unknown): { error?: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, ...(error.stack ? { stack: error.stack } : {}) };
  }
  if (error === undefined) {
    return {};
  }
  return { error: String(error) };
}

// Export logger with utility methods
export const logger = {
  info: (context: string, message: string, metadata?: LogMetadata) => {
    winstonLogger.info(message, { context, ...metadata });
  },
  error: (
    context: string,
    message: string,
    error?: unknown,
    metadata?: LogMetadata
  ) => {
    winstonLogger.error(message, {
      context,
      ...describeError(error),
      ...metadata,
    });
  },
  warn: (context: string, message: string, metadata?: LogMetadata) => {
    winstonLogger.warn(message, { context, ...metadata });
  },
  debug: (context: string, message: string, metadata?: LogMetadata) => {
    winstonLogger.debug(message, { context, ...metadata });
  },
};

export default logger;
