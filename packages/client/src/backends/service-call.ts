import { error as logError } from 'firebase-functions/logger';
import { fail, ok, type AppError, type Result } from '@periolifts/shared';
import { toAppError } from '../errors/error-mapper.js';

/**
 * Runs a backend call and converts anything it throws. Unclassified
 * failures are logged as `<scope>.<operation> failed`.
 */
export async function runServiceCall<R>(
  scope: string,
  operation: string,
  fallbackMessage: string,
  action: () => Promise<R>
): Promise<Result<R>> {
  try {
    return ok(await action());
  } catch (error) {
    const appError: AppError = toAppError(error, fallbackMessage);
    if (appError.code === 'UNKNOWN_ERROR') {
      logError(`${scope}.${operation} failed`, { error });
    }
    return fail(appError);
  }
}
