import type { AppError } from './errors.js';

/**
 * Outcome of a service call. Mirrors the `{ success, data | error }` envelope
 * used for API responses.
 */
export type Result<T> = Success<T> | Failure;

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: AppError;
}

export function ok<T>(data: T): Success<T> {
  return { success: true, data };
}

export function fail(error: AppError): Failure {
  return { success: false, error };
}

export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success;
}

export function isFailure<T>(result: Result<T>): result is Failure {
  return !result.success;
}

export function mapResult<T, U>(result: Result<T>, transform: (data: T) => U): Result<U> {
  return result.success ? ok(transform(result.data)) : result;
}

export async function flatMapResult<T, U>(
  result: Result<T>,
  next: (data: T) => Promise<Result<U>>
): Promise<Result<U>> {
  return result.success ? next(result.data) : result;
}

export function getOrThrow<T>(result: Result<T>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

export function getOrDefault<T>(result: Result<T>, fallback: T): T {
  return result.success ? result.data : fallback;
}

export function getOrElse<T>(result: Result<T>, fallback: (error: AppError) => T): T {
  return result.success ? result.data : fallback(result.error);
}
