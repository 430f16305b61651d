/**
 * Base error types for the application
 * All domain errors should extend these base types
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Infrastructure errors (cache backends, network, external services)
 */
export interface InfraError extends AppError {
  readonly type: 'ConnectionError' | 'SerializationError' | 'TimeoutError';
  readonly retryable: boolean;
}

/**
 * Formats TypeBox-style value errors as `path: message` lines.
 */
export const formatSchemaErrors = (
  errors: Iterable<{ path: string; message: string }>
): string[] => Array.from(errors).map((error) => `${error.path}: ${error.message}`);
