/**
 * Shared Response Helpers
 *
 * Factory functions to create service-specific response helpers with consistent
 * response formats matching the ServiceResponse<T> contract from @folio/shared-contracts.
 *
 * Usage:
 *   import { createResponseHelpers } from '@folio/platform-core';
 *   const { sendSuccess, ServiceErrors } = createResponseHelpers('my-service');
 */

import type { Response } from 'express';
import { StructuredErrors, getCorrelationId } from '@folio/shared-contracts';

type RequestWithHeaders = { headers: Record<string, string | string[] | undefined> };

export interface ServiceErrorHelpers {
  fromException: (res: Response, error: unknown, fallbackMessage: string, req?: RequestWithHeaders) => void;
  notFound: (res: Response, resource: string, req?: RequestWithHeaders, details?: Record<string, unknown>) => void;
  rateLimited: (res: Response, req?: RequestWithHeaders) => void;
  internal: (res: Response, message: string, req?: RequestWithHeaders) => void;
}

export interface ResponseHelpers {
  sendSuccess: <T>(res: Response, data: T, statusCode?: number) => void;
  ServiceErrors: ServiceErrorHelpers;
}

function createServiceErrors(serviceName: string): ServiceErrorHelpers {
  const context = (req?: RequestWithHeaders, details?: Record<string, unknown>) => ({
    service: serviceName,
    correlationId: req ? getCorrelationId(req) : undefined,
    details,
  });

  return {
    fromException: (res, error, fallbackMessage, req) => {
      StructuredErrors.fromException(res, error, fallbackMessage, context(req));
    },

    notFound: (res, resource, req, details) => {
      StructuredErrors.notFound(res, resource, context(req, details));
    },

    rateLimited: (res, req) => {
      StructuredErrors.rateLimited(res, 'Too many requests, please try again later', context(req));
    },

    internal: (res, message, req) => {
      StructuredErrors.internal(res, message || 'Internal error', context(req));
    },
  };
}

function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
  res.status(statusCode).json({
    success: true,
    data,
    timestamp: new Date().toISOString(),
  });
}

/**
 * Create response helpers for a specific service
 *
 * @example
 * ```typescript
 * const { sendSuccess, ServiceErrors } = createResponseHelpers('reader-service');
 *
 * try {
 *   sendSuccess(res, await useCase.execute(input));
 * } catch (error) {
 *   ServiceErrors.fromException(res, error, 'Failed to read chapter', req);
 * }
 * ```
 */
export function createResponseHelpers(serviceName: string): ResponseHelpers {
  return {
    sendSuccess,
    ServiceErrors: createServiceErrors(serviceName),
  };
}
