/**
 * Custom error classes for the application
 * These errors provide safe, non-PHI error messages for operators and API responses
 */

import type { EntityType } from '@clinigraph/types';

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
   * Get safe error details for API response (no sensitive info)
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
 * Required connection parameters are absent or malformed.
 * Raised before any connection attempt.
 */
export class ConfigurationError extends AppError {
  public readonly missingKeys: string[];

  constructor(message: string, missingKeys: string[] = []) {
    super(message, 'CONFIGURATION_ERROR', 500);
    this.name = 'ConfigurationError';
    this.missingKeys = missingKeys;
  }
}

/**
 * Source warehouse cannot be reached (credentials rejected, network failure)
 */
export class SourceUnavailableError extends AppError {
  public readonly originalError: Error | undefined;

  constructor(message = 'Source connection failed', originalError?: Error) {
    super(message, 'SOURCE_UNAVAILABLE', 503);
    this.name = 'SourceUnavailableError';
    this.originalError = originalError;
  }
}

/**
 * Graph store cannot be reached (credentials rejected, network failure)
 */
export class GraphStoreUnavailableError extends AppError {
  public readonly originalError: Error | undefined;

  constructor(message = 'Graph store connection failed', originalError?: Error) {
    super(message, 'GRAPH_STORE_UNAVAILABLE', 503);
    this.name = 'GraphStoreUnavailableError';
    this.originalError = originalError;
  }
}

/**
 * An extract did not return the expected columns, or the source rejected the statement
 */
export class SourceQueryError extends AppError {
  public readonly entityType: EntityType;
  public readonly missingColumns: string[];
  public readonly originalError: Error | undefined;

  constructor(
    entityType: EntityType,
    message: string,
    missingColumns: string[] = [],
    originalError?: Error
  ) {
    super(`${entityType} extract failed: ${message}`, 'SOURCE_QUERY_ERROR', 500);
    this.name = 'SourceQueryError';
    this.entityType = entityType;
    this.missingColumns = missingColumns;
    this.originalError = originalError;
  }
}

/**
 * A single row could not be upserted. Rows before it stay committed.
 */
export class RowUpsertError extends AppError {
  public readonly entityType: EntityType;
  public readonly rowIndex: number;
  public readonly processed: number;
  public readonly originalError: Error | undefined;

  constructor(
    entityType: EntityType,
    rowIndex: number,
    processed: number,
    message: string,
    originalError?: Error
  ) {
    super(
      `${entityType} row ${rowIndex + 1} upsert failed: ${message}`,
      'ROW_UPSERT_FAILED',
      500
    );
    this.name = 'RowUpsertError';
    this.entityType = entityType;
    this.rowIndex = rowIndex;
    this.processed = processed;
    this.originalError = originalError;
  }
}

/**
 * A read query failed or was refused. Only raised on the question path,
 * where it is turned into a soft answer.
 */
export class QueryExecutionError extends AppError {
  public readonly originalError: Error | undefined;

  constructor(message: string, originalError?: Error) {
    super(message, 'QUERY_EXECUTION_ERROR', 500);
    this.name = 'QueryExecutionError';
    this.originalError = originalError;
  }
}

/**
 * External service error (OpenAI)
 */
export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly originalError: Error | undefined;

  constructor(service: string, message: string, originalError?: Error) {
    super(`${service} error: ${message}`, 'EXTERNAL_SERVICE_ERROR', 502);
    this.name = 'ExternalServiceError';
    this.service = service;
    this.originalError = originalError;
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
 * Narrow an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
