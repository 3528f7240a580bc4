/**
 * Logging Middleware
 *
 * Express middleware for request logging with correlation
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { generateCorrelationId, runWithContext, type LogContext } from './context.js';
import { getLogger } from './logger.js';

export const CORRELATION_HEADER = 'x-correlation-id';

/**
 * Express middleware for request logging with correlation ID
 */
export function requestLogger(serviceName: string): RequestHandler {
  const logger = getLogger(serviceName);

  return (req: Request, res: Response, next: NextFunction) => {
    const rawCorrelationId = req.headers[CORRELATION_HEADER] || generateCorrelationId();
    const correlationId = Array.isArray(rawCorrelationId) ? rawCorrelationId[0] : rawCorrelationId;
    // Later handlers read the id back from the request headers
    req.headers[CORRELATION_HEADER] = correlationId;

    const context: LogContext = {
      correlationId,
      service: serviceName,
      method: req.method,
      url: req.originalUrl,
    };

    res.setHeader(CORRELATION_HEADER, correlationId);

    const startedAt = Date.now();
    res.on('finish', () => {
      logger.debug('Request completed', {
        ...context,
        statusCode: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });

    runWithContext(context, next);
  };
}
