import { ClientResponseError } from 'pocketbase';
import { AppwriteException } from 'node-appwrite';
import {
  AppError,
  AuthenticationError,
  NetworkError,
  NotFoundError,
  PermissionError,
  ServerError,
  UnknownError,
  ValidationError,
} from '@periolifts/shared';
import { isRecord, readString } from '../backends/type-guards.js';

interface StatusDetails {
  statusCode: number;
  response: unknown;
}

/**
 * Maps an HTTP status to the matching error class. Status 0 (no response)
 * and anything else unmapped is a network failure.
 */
export function errorForStatus(
  statusCode: number,
  message: string,
  response: unknown,
  cause: unknown
): AppError {
  const details: StatusDetails = { statusCode, response };
  const options = { cause };

  if (statusCode === 400) {
    return new ValidationError(message || 'Invalid request data', details, options);
  }
  if (statusCode === 401) {
    return new AuthenticationError(message || 'Authentication required', details, options);
  }
  if (statusCode === 403) {
    return new PermissionError(message || 'Permission denied', details, options);
  }
  if (statusCode === 404) {
    return new NotFoundError(message || 'Resource not found', details, options);
  }
  if (statusCode > 400 && statusCode < 500) {
    return new ValidationError(message || 'Client error', details, options);
  }
  if (statusCode >= 500) {
    return new ServerError(message || 'Server error', details, statusCode, options);
  }
  return new NetworkError(message || 'Network error', details, options);
}

/**
 * Field errors ("field: message, ...") take precedence over the generic
 * response message.
 */
export function extractPocketBaseMessage(response: unknown): string {
  if (!isRecord(response)) {
    return '';
  }
  const data = response['data'];
  if (isRecord(data)) {
    const fieldErrors = Object.entries(data)
      .map(([field, value]) => {
        if (!isRecord(value)) {
          return null;
        }
        const message = readString(value, 'message');
        return message === null ? null : `${field}: ${message}`;
      })
      .filter((entry): entry is string => entry !== null);
    if (fieldErrors.length > 0) {
      return fieldErrors.join(', ');
    }
  }
  return readString(response, 'message') ?? '';
}

export function mapPocketBaseError(error: ClientResponseError): AppError {
  return errorForStatus(
    error.status,
    extractPocketBaseMessage(error.response),
    error.response,
    error
  );
}

export function mapAppwriteError(error: AppwriteException): AppError {
  return errorForStatus(error.code, error.message, error.type, error);
}

/**
 * Converts anything thrown by a backend call into an AppError.
 */
export function toAppError(error: unknown, fallbackMessage: string): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof ClientResponseError) {
    return mapPocketBaseError(error);
  }
  if (error instanceof AppwriteException) {
    return mapAppwriteError(error);
  }
  return new UnknownError(fallbackMessage, undefined, { cause: error });
}
