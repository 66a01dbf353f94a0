/**
 * Error types shared by the pipeline and the services.
 *
 * Only catalog and input errors ever escape to a caller; validator errors are
 * caught inside the matching stage and every other failure is turned into an
 * `error` routing outcome by the orchestrator.
 */

export const ERROR_CODES = {
  CATALOG_INVALID: 'CATALOG_INVALID',
  VALIDATOR_UNAVAILABLE: 'VALIDATOR_UNAVAILABLE',
  VALIDATOR_MALFORMED_RESPONSE: 'VALIDATOR_MALFORMED_RESPONSE',
  INVALID_INPUT: 'INVALID_INPUT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class WarrantTriageError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class CatalogError extends WarrantTriageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ERROR_CODES.CATALOG_INVALID, message, details);
  }
}

export class ValidatorUnavailableError extends WarrantTriageError {
  constructor(message: string, cause?: unknown) {
    super(ERROR_CODES.VALIDATOR_UNAVAILABLE, message, {
      cause: cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause),
    });
  }
}

export class MalformedValidatorResponseError extends WarrantTriageError {
  readonly violations: string[];

  constructor(violations: string[]) {
    super(
      ERROR_CODES.VALIDATOR_MALFORMED_RESPONSE,
      `Semantic validator response violates the contract: ${violations.slice(0, 3).join('; ')}`,
      { violations }
    );
    this.violations = violations;
  }
}

export class InvalidInputError extends WarrantTriageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ERROR_CODES.INVALID_INPUT, message, details);
  }
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}

/**
 * Build the HTTP error body for any thrown value.
 */
export function toErrorEnvelope(error: unknown, correlationId: string): ErrorEnvelope {
  if (error instanceof WarrantTriageError) {
    return {
      error: { code: error.code, message: error.message, correlation_id: correlationId },
    };
  }
  return {
    error: {
      code: ERROR_CODES.INTERNAL_ERROR,
      message: error instanceof Error ? error.message : 'Unknown error',
      correlation_id: correlationId,
    },
  };
}

/**
 * HTTP status for a thrown value.
 */
export function statusForError(error: unknown): number {
  if (error instanceof WarrantTriageError) {
    switch (error.code) {
      case ERROR_CODES.INVALID_INPUT:
        return 400;
      case ERROR_CODES.CATALOG_INVALID:
        return 500;
      case ERROR_CODES.VALIDATOR_UNAVAILABLE:
      case ERROR_CODES.VALIDATOR_MALFORMED_RESPONSE:
        return 502;
      default:
        return 500;
    }
  }
  return 500;
}
