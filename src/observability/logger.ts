import pino from 'pino';
import { appConfig } from '../config/index.js';

const isDevelopment = appConfig.observability.environment === 'development';

// stdout carries the structured progress stream; diagnostics go to stderr.
export const logger = pino(
  {
    level: appConfig.observability.logLevel,
    transport: isDevelopment ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        destination: 2,
      },
    } : undefined,
    formatters: isDevelopment ? undefined : {
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  isDevelopment ? undefined : pino.destination({ fd: 2, sync: true }),
);

export interface LogContext {
  operation?: string;
  collection?: string;
  batch?: number;
  duration?: number;
  [key: string]: unknown;
}

export const createContextLogger = (context: LogContext) => {
  return logger.child(context);
};

export default logger;
