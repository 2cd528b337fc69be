import winston from 'winston';
import { config } from '../config';
import { isEngineError } from '../engine/errors';

const SERVICE_NAME = 'royal-tiles-engine';

/**
 * Custom format to structure log metadata consistently.
 */
export const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }
  if (!info.environment) {
    info.environment = config.nodeEnv;
  }

  // Engine errors carry their own code/context; plain errors keep name and stack
  const error: unknown = info.error;
  if (isEngineError(error)) {
    info.error = error.toJSON();
  } else if (error instanceof Error) {
    info.error = {
      message: error.message,
      name: error.name,
      stack: error.stack,
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
  structuredFormat(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service, environment, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level} [${String(service)}/${String(environment)}]: ${String(message)}${metaStr}`;
  })
);

const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: config.nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
    }),
  ],
});

/**
 * Child logger tagged with the engine component that emits the entry.
 */
export const componentLogger = (component: string): winston.Logger => logger.child({ component });

export { logger };
