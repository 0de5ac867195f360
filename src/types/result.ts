/**
 * Result Pattern Implementation
 *
 * Services and the orchestrator return Result<T> - they never throw across
 * a service boundary. The error shape is generic so that callers such as the
 * orchestrator can carry typed context (conversation id, partial answer).
 */

export interface ErrorInfo<C extends string = string> {
  code: C;
  message: string;
  details?: Record<string, unknown>;
}

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure<E extends ErrorInfo = ErrorInfo> {
  success: false;
  error: E;
}

export type Result<T, E extends ErrorInfo = ErrorInfo> = Success<T> | Failure<E>;

/**
 * Helper function to create a success result
 */
export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

/**
 * Helper function to create a failure result
 */
export function failure(
  code: string,
  message: string,
  details?: Record<string, unknown>
): Failure {
  const error: ErrorInfo = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return {
    success: false,
    error,
  };
}

/**
 * Create a failure carrying a fully-typed error object
 */
export function failWith<E extends ErrorInfo>(error: E): Failure<E> {
  return { success: false, error };
}

/**
 * Type guard to check if result is success
 */
export function isSuccess<T, E extends ErrorInfo>(
  result: Result<T, E>
): result is Success<T> {
  return result.success === true;
}

/**
 * Type guard to check if result is failure
 */
export function isFailure<T, E extends ErrorInfo>(
  result: Result<T, E>
): result is Failure<E> {
  return result.success === false;
}
