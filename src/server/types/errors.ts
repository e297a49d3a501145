/**
 * Centralized error type definitions for the occupancy pipeline
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A caller broke an API contract (negative age offset, reversed interval).
 * Indicates a bug in the caller, never dirty input data.
 */
export class ContractViolationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONTRACT_VIOLATION, false, context);
  }
}

/**
 * Invalid command line or configuration input
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.VALIDATION_ERROR, true, context);
  }
}

export type BoundaryCollaborator = 'record-source' | 'existing-output' | 'sink';

/**
 * An external collaborator (record source, existing-output query, sink) failed.
 * The run is aborted; rows upserted before the failure stay in place.
 */
export class BoundaryError extends AppError {
  public readonly collaborator: BoundaryCollaborator;

  constructor(
    collaborator: BoundaryCollaborator,
    message: string,
    cause?: unknown,
    context?: Record<string, unknown>
  ) {
    super(
      `Boundary failure (${collaborator}): ${message}`,
      ErrorCode.BOUNDARY_ERROR,
      true,
      {
        collaborator,
        cause: cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause),
        ...context,
      }
    );
    this.collaborator = collaborator;
  }
}

export class RecordSourceError extends BoundaryError {
  constructor(message: string, cause?: unknown, context?: Record<string, unknown>) {
    super('record-source', message, cause, context);
  }
}

export class ExistingOutputError extends BoundaryError {
  constructor(message: string, cause?: unknown, context?: Record<string, unknown>) {
    super('existing-output', message, cause, context);
  }
}

export class SinkError extends BoundaryError {
  constructor(message: string, cause?: unknown, context?: Record<string, unknown>) {
    super('sink', message, cause, context);
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONTRACT_VIOLATION = 'CONTRACT_VIOLATION',
  BOUNDARY_ERROR = 'BOUNDARY_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Type guard to check if error is a boundary failure
 */
export function isBoundaryError(error: unknown): error is BoundaryError {
  return error instanceof BoundaryError;
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
    return new AppError(error.message, ErrorCode.INTERNAL_ERROR, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_ERROR, false);
}
