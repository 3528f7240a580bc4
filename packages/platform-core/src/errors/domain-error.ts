/**
 * Domain Errors
 *
 * Typed error base used by services. Controllers translate these into the
 * structured error envelope through the response helpers.
 */

export const DomainErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
} as const;

export type DomainErrorCodeType = (typeof DomainErrorCode)[keyof typeof DomainErrorCode];

export class DomainError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number = 500, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'DomainError';
    this.statusCode = statusCode;
  }
}

export interface DomainServiceError<TCode extends string> extends DomainError {
  readonly code: TCode;
  readonly domain: string;
}

export interface DomainServiceErrorClass<TCode extends string> {
  new (message: string, statusCode: number, code: TCode, cause?: Error): DomainServiceError<TCode>;
}

/**
 * Build a service-specific error class whose `code` is restricted to the given code table.
 *
 * @example
 * ```typescript
 * const ReaderErrorBase = createDomainServiceError('Reader', ReaderErrorCode);
 * export class ReaderError extends ReaderErrorBase {}
 * ```
 */
export function createDomainServiceError<TCodes extends Record<string, string>>(
  domain: string,
  _codes: TCodes
): DomainServiceErrorClass<TCodes[keyof TCodes]> {
  type Code = TCodes[keyof TCodes];

  return class extends DomainError implements DomainServiceError<Code> {
    readonly code: Code;
    readonly domain = domain;

    constructor(message: string, statusCode: number, code: Code, cause?: Error) {
      super(message, statusCode, cause);
      this.name = `${domain}Error`;
      this.code = code;
    }
  };
}
