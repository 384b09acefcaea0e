/**
 * Custom error classes for the event-sourcing core
 * These errors provide safe, payload-free messages for operator tooling
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details (no payload data)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Validation error for invalid input
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Optimistic concurrency failure: the stream moved past the expected version
 */
export class VersionConflictError extends AppError {
  public readonly streamId: string;
  public readonly expectedVersion: number;
  public readonly actualVersion: number;

  constructor(streamId: string, expectedVersion: number, actualVersion: number) {
    super(
      `Version conflict on stream ${streamId}: expected ${expectedVersion}, actual ${actualVersion}`,
      'VERSION_CONFLICT',
      409
    );
    this.name = 'VersionConflictError';
    this.streamId = streamId;
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

/**
 * Retry budget for rehydrate-and-retry spent without a successful append
 */
export class ConcurrencyExhaustedError extends AppError {
  public readonly streamId: string;
  public readonly attempts: number;

  constructor(streamId: string, attempts: number) {
    super(
      `Gave up appending to stream ${streamId} after ${attempts} attempts due to concurrent writers`,
      'CONCURRENCY_EXHAUSTED',
      409
    );
    this.name = 'ConcurrencyExhaustedError';
    this.streamId = streamId;
    this.attempts = attempts;
  }
}

/**
 * Journal, snapshot or DLQ storage unavailable
 */
export class StorageError extends AppError {
  public readonly operation: string;
  public readonly originalError: Error | undefined;

  constructor(operation: string, message: string, originalError?: Error) {
    super(`Storage ${operation} failed: ${message}`, 'STORAGE_FAILURE', 503);
    this.name = 'StorageError';
    this.operation = operation;
    this.originalError = originalError;
  }
}

/**
 * A projection handler or its read-model write failed for one event
 */
export class ProjectionApplyError extends AppError {
  public readonly projectionName: string;
  public readonly streamId: string;
  public readonly version: number;
  public readonly originalError: Error | undefined;

  constructor(projectionName: string, streamId: string, version: number, originalError?: Error) {
    super(
      `Projection ${projectionName} failed to apply ${streamId}@${version}: ${
        originalError?.message ?? 'unknown error'
      }`,
      'PROJECTION_APPLY_FAILURE',
      500
    );
    this.name = 'ProjectionApplyError';
    this.projectionName = projectionName;
    this.streamId = streamId;
    this.version = version;
    this.originalError = originalError;
  }
}

/**
 * An event arrived out of sequence for a stream
 */
export class SequenceGapError extends AppError {
  public readonly streamId: string;
  public readonly expectedVersion: number;
  public readonly receivedVersion: number;

  constructor(streamId: string, expectedVersion: number, receivedVersion: number) {
    super(
      `Sequence gap on stream ${streamId}: expected version ${expectedVersion}, received ${receivedVersion}`,
      'SEQUENCE_GAP',
      409
    );
    this.name = 'SequenceGapError';
    this.streamId = streamId;
    this.expectedVersion = expectedVersion;
    this.receivedVersion = receivedVersion;
  }
}

/**
 * Aggregate has no handler for an event type found in its stream
 */
export class UnknownEventTypeError extends AppError {
  public readonly aggregateName: string;
  public readonly eventType: string;

  constructor(aggregateName: string, eventType: string) {
    super(`Aggregate ${aggregateName} has no handler for event type ${eventType}`, 'UNKNOWN_EVENT_TYPE', 500);
    this.name = 'UnknownEventTypeError';
    this.aggregateName = aggregateName;
    this.eventType = eventType;
  }
}

/**
 * Projection name not registered with the runner
 */
export class ProjectionNotFoundError extends AppError {
  public readonly projectionName: string;

  constructor(projectionName: string) {
    super(`Projection '${projectionName}' not found`, 'PROJECTION_NOT_FOUND', 404);
    this.name = 'ProjectionNotFoundError';
    this.projectionName = projectionName;
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Convert unknown error to safe error response
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
