import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { StructuredErrors, getCorrelationId } from '@folio/shared-contracts';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface RequestSchemas<P, Q> {
  params: Schema<P>;
  query: Schema<Q>;
}

export interface ValidatedInput<P, Q> {
  params: P;
  query: Q;
}

export type ValidatedHandler<P, Q> = (input: ValidatedInput<P, Q>, req: Request, res: Response) => Promise<void> | void;

export const EmptySchema = z.object({});
export type EmptyInput = z.infer<typeof EmptySchema>;

function handleZodError(res: Response, req: Request, error: z.ZodError, serviceName: string, message: string): void {
  StructuredErrors.validation(res, message, {
    service: serviceName,
    correlationId: getCorrelationId(req),
    details: {
      errors: error.errors.map(err => ({
        field: err.path.join('.'),
        message: err.message,
        code: err.code,
      })),
    },
  });
}

/**
 * Validates params and query against zod schemas, then hands the parsed values to `handler`.
 * Rejected requests answer 400 with one entry per failing field.
 */
export function createValidateRequest(serviceName: string) {
  return function validateRequest<P, Q>(schemas: RequestSchemas<P, Q>, handler: ValidatedHandler<P, Q>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const params = schemas.params.safeParse(req.params);
      if (!params.success) {
        handleZodError(res, req, params.error, serviceName, 'URL parameters validation failed');
        return;
      }

      const query = schemas.query.safeParse(req.query);
      if (!query.success) {
        handleZodError(res, req, query.error, serviceName, 'Query parameters validation failed');
        return;
      }

      Promise.resolve(handler({ params: params.data, query: query.data }, req, res)).catch(next);
    };
  };
}

export interface ValidationMiddleware {
  validateRequest: ReturnType<typeof createValidateRequest>;
}

export function createValidation(serviceName: string): ValidationMiddleware {
  return {
    validateRequest: createValidateRequest(serviceName),
  };
}
