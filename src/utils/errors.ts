// Utilities: Custom error types
// Every mutation failure surfaces as one of these, mapped 1:1 to a tool result code

export type ErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'VALIDATION_ERROR'
  | 'PERSISTENCE_FAILURE'
  | 'UNKNOWN_TOOL';

export abstract class CampaignError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: ErrorCode;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

export class NotFoundError extends CampaignError {
  readonly statusCode = 404;
  readonly code = 'NOT_FOUND';
}

export class InvalidStateError extends CampaignError {
  readonly statusCode = 409;
  readonly code = 'INVALID_STATE';
}

export class ValidationError extends CampaignError {
  readonly statusCode = 400;
  readonly code = 'VALIDATION_ERROR';
}

export class PersistenceError extends CampaignError {
  readonly statusCode = 500;
  readonly code = 'PERSISTENCE_FAILURE';

  constructor(message: string, cause?: unknown) {
    super(message, cause instanceof Error ? { cause: cause.message } : undefined);
    this.cause = cause;
  }
}

export class UnknownToolError extends CampaignError {
  readonly statusCode = 404;
  readonly code = 'UNKNOWN_TOOL';
}

export function isCampaignError(error: unknown): error is CampaignError {
  return error instanceof CampaignError;
}

/**
 * HTTP status for a failure code, for transports that only see the code
 */
export const STATUS_BY_CODE: Record<ErrorCode | 'INTERNAL_ERROR', number> = {
  NOT_FOUND: 404,
  INVALID_STATE: 409,
  VALIDATION_ERROR: 400,
  PERSISTENCE_FAILURE: 500,
  UNKNOWN_TOOL: 404,
  INTERNAL_ERROR: 500,
};
