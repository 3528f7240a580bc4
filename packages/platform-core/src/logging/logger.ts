/**
 * Logger
 *
 * Winston logger creation and management
 */

import * as winston from 'winston';
import { hostname } from 'os';
import { createDevFormat, createProdFormat } from './formatting.js';

export interface LoggerOptions {
  level?: string;
  meta?: Record<string, string | undefined>;
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;

  switch (env.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'warn';
    default:
      return 'debug';
  }
}

/**
 * Create a Winston logger instance
 */
export function createLogger(serviceName: string, options: LoggerOptions = {}): winston.Logger {
  const meta = {
    service: serviceName,
    env: process.env.NODE_ENV || 'development',
    version: process.env.npm_package_version,
    instanceId: process.env.INSTANCE_ID || process.env.HOSTNAME || hostname() || 'unknown',
    ...options.meta,
  };

  const isDevelopment = (process.env.NODE_ENV || 'development') === 'development';

  return winston.createLogger({
    level: options.level ?? resolveLogLevel(),
    defaultMeta: meta,
    format: isDevelopment ? createDevFormat() : createProdFormat(),
    transports: [new winston.transports.Console()],
  });
}

const loggers = new Map<string, winston.Logger>();

/**
 * Get or create a logger for a service or module
 */
export function getLogger(serviceOrModule: string): winston.Logger {
  const existing = loggers.get(serviceOrModule);
  if (existing) return existing;

  const logger = createLogger(serviceOrModule);
  loggers.set(serviceOrModule, logger);
  return logger;
}
