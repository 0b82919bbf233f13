/**
 * Centralized error type definitions
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Client errors
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  MALFORMED_SPECIFICATION = 'MALFORMED_SPECIFICATION',

  // Reasoning service faults
  THROTTLE_EXHAUSTED = 'THROTTLE_EXHAUSTED',
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  REQUEST_REJECTED = 'REQUEST_REJECTED',
  UNPARSEABLE_RESPONSE = 'UNPARSEABLE_RESPONSE',
  RUN_CANCELLED = 'RUN_CANCELLED',

  // Server errors
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
  DUPLICATE_CELL_TARGET = 'DUPLICATE_CELL_TARGET',
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, additionalContext?: Record<string, unknown>) {
    const message = identifier ? `${resource} with identifier '${identifier}' not found` : `${resource} not found`;
    super(message, ErrorCode.NOT_FOUND, 404, true, { resource, identifier, ...additionalContext });
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.BAD_REQUEST, 400, true, context);
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, context?: Record<string, unknown>) {
    super(
      `External service error (${service}): ${message}`,
      ErrorCode.EXTERNAL_SERVICE_ERROR,
      502,
      true,
      { service, ...context }
    );
  }
}

/**
 * The master spreadsheet cannot be turned into specification rows.
 * Fatal to the load; nothing is returned partially.
 */
export class MalformedSpecificationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.MALFORMED_SPECIFICATION, 422, true, context);
  }
}

/**
 * The reasoning service kept signalling throttling until the attempt budget ran out.
 */
export class ThrottleExhaustedError extends AppError {
  constructor(attempts: number, context?: Record<string, unknown>) {
    super(`Reasoning service still throttling after ${attempts} attempts`, ErrorCode.THROTTLE_EXHAUSTED, 503, true, {
      attempts,
      ...context,
    });
  }
}

/**
 * Network, timeout or server-side failure that survived every retry.
 */
export class TransportError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.TRANSPORT_ERROR, 502, true, context);
  }
}

/**
 * The reasoning service refused the request itself; retrying will not help.
 */
export class RequestRejectedError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.REQUEST_REJECTED, 502, true, context);
  }
}

export class UnparseableResponseError extends AppError {
  constructor(message: string = 'unparseable response', context?: Record<string, unknown>) {
    super(message, ErrorCode.UNPARSEABLE_RESPONSE, 502, true, context);
  }
}

export class RunCancelledError extends AppError {
  constructor(reason: string = 'cancelled', context?: Record<string, unknown>) {
    super(reason, ErrorCode.RUN_CANCELLED, 503, true, context);
  }
}

/**
 * Two verdicts tried to rewrite the same master cell. Indicates a bug upstream
 * (rows and cells are one-to-one), so it is never resolved silently.
 */
export class DuplicateCellTargetError extends AppError {
  constructor(sheet: string, address: string, parameters: string[]) {
    super(
      `Cell ${sheet}!${address} is targeted by more than one mismatch verdict (${parameters.join(', ')})`,
      ErrorCode.DUPLICATE_CELL_TARGET,
      500,
      false,
      { sheet, address, parameters }
    );
  }
}

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path?: string;
  context?: Record<string, unknown>;
  stack?: string; // Only in development
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Type guard to check if error is an operational error
 */
export function isOperationalError(error: unknown): boolean {
  return isAppError(error) && error.isOperational;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
}
