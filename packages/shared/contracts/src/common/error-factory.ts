/**
 * Structured Error Factory
 *
 * Creates consistent error responses that preserve error details across service boundaries.
 */

import type { Response } from 'express';
import type { ServiceError } from './index.js';

export type ErrorCode =
  | 'UNKNOWN'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'RATE_LIMITED'
  | 'SERVICE_UNAVAILABLE'
  | 'INTERNAL_ERROR';

export type ErrorType =
  | 'ValidationError'
  | 'NotFoundError'
  | 'RateLimitError'
  | 'ServiceUnavailableError'
  | 'InternalError';

export interface StructuredError {
  type: ErrorType;
  code: string;
  message: string;
  details?: Record<string, unknown>;
  service?: string;
  correlationId?: string;
}

export interface StructuredErrorOptions {
  details?: Record<string, unknown>;
  service?: string;
  correlationId?: string;
}

interface ErrorLike {
  message: string;
  statusCode?: number;
  code?: string;
}

function toErrorLike(error: unknown): ErrorLike {
  if (error instanceof Error) {
    const statusCode: unknown = Reflect.get(error, 'statusCode');
    const code: unknown = Reflect.get(error, 'code');
    return {
      message: error.message,
      statusCode: typeof statusCode === 'number' ? statusCode : undefined,
      code: typeof code === 'string' ? code : undefined,
    };
  }
  if (typeof error === 'string') {
    return { message: error };
  }
  return { message: '' };
}

export function createStructuredError(
  code: string,
  type: ErrorType,
  message: string,
  options: StructuredErrorOptions = {}
): StructuredError {
  const result: StructuredError = { type, code, message };

  if (options.details) result.details = options.details;
  if (options.service) result.service = options.service;
  if (options.correlationId) result.correlationId = options.correlationId;

  return result;
}

/**
 * Send a structured error response
 */
export function sendStructuredError(res: Response, statusCode: number, error: StructuredError): void {
  const details = error.service ? { ...error.details, service: error.service } : error.details;

  const responseError: ServiceError = {
    type: error.type,
    code: error.code,
    message: error.message,
    ...(details ? { details } : {}),
    ...(error.correlationId ? { correlationId: error.correlationId } : {}),
  };

  res.status(statusCode).json({
    success: false,
    error: responseError,
    timestamp: new Date().toISOString(),
  });
}

export function statusCodeToErrorCode(statusCode: number): ErrorCode {
  switch (statusCode) {
    case 400:
    case 422:
      return 'VALIDATION_ERROR';
    case 404:
      return 'NOT_FOUND';
    case 429:
      return 'RATE_LIMITED';
    case 503:
      return 'SERVICE_UNAVAILABLE';
    default:
      return 'INTERNAL_ERROR';
  }
}

export function statusCodeToErrorType(statusCode: number): ErrorType {
  switch (statusCode) {
    case 400:
    case 422:
      return 'ValidationError';
    case 404:
      return 'NotFoundError';
    case 429:
      return 'RateLimitError';
    case 503:
      return 'ServiceUnavailableError';
    default:
      return 'InternalError';
  }
}

/**
 * Structured Error Factory
 * Use these methods in controllers to create consistent error responses
 */
export const StructuredErrors = {
  /**
   * Validation error (400) - for invalid input
   */
  validation: (res: Response, message: string, options?: StructuredErrorOptions) => {
    sendStructuredError(res, 400, createStructuredError('VALIDATION_ERROR', 'ValidationError', message, options));
  },

  /**
   * Not found error (404) - for missing resources
   */
  notFound: (res: Response, resource: string, options?: StructuredErrorOptions) => {
    sendStructuredError(res, 404, createStructuredError('NOT_FOUND', 'NotFoundError', `${resource} not found`, options));
  },

  rateLimited: (res: Response, message: string = 'Too many requests', options?: StructuredErrorOptions) => {
    sendStructuredError(res, 429, createStructuredError('RATE_LIMITED', 'RateLimitError', message, options));
  },

  /**
   * Internal error (500) - for unexpected failures
   */
  internal: (res: Response, message: string, options?: StructuredErrorOptions) => {
    sendStructuredError(res, 500, createStructuredError('INTERNAL_ERROR', 'InternalError', message, options));
  },

  /**
   * Create error from caught exception.
   * Typed errors carrying a 4xx/5xx `statusCode` keep their status and code;
   * anything else is an internal error with the fallback message.
   */
  fromException: (res: Response, error: unknown, fallbackMessage: string, options?: StructuredErrorOptions) => {
    const info = toErrorLike(error);
    const hasStatusCode = info.statusCode !== undefined && info.statusCode >= 400 && info.statusCode < 600;

    if (hasStatusCode && info.statusCode !== undefined) {
      const statusCode = info.statusCode;
      sendStructuredError(
        res,
        statusCode,
        createStructuredError(
          info.code ?? statusCodeToErrorCode(statusCode),
          statusCodeToErrorType(statusCode),
          info.message || fallbackMessage,
          options
        )
      );
      return;
    }

    sendStructuredError(res, 500, createStructuredError('INTERNAL_ERROR', 'InternalError', fallbackMessage, options));
  },
};

/**
 * Helper to get correlation ID from request headers
 */
export function getCorrelationId(req: { headers: Record<string, string | string[] | undefined> }): string | undefined {
  const value = req.headers['x-correlation-id'] || req.headers['x-request-id'];
  return Array.isArray(value) ? value[0] : value;
}
