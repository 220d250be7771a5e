/**
 * Error taxonomy shared by every service. Services never throw these across
 * their boundary; they return them inside a failed {@link Result}.
 */

export const ERROR_CODES = [
  'VALIDATION_ERROR',
  'AUTHENTICATION_ERROR',
  'PERMISSION_ERROR',
  'NOT_FOUND',
  'NETWORK_ERROR',
  'SERVER_ERROR',
  'UNKNOWN_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super('VALIDATION_ERROR', message, details, 400, options);
    this.name = 'ValidationError';
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super('AUTHENTICATION_ERROR', message, details, 401, options);
    this.name = 'AuthenticationError';
  }
}

export class PermissionError extends AppError {
  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super('PERMISSION_ERROR', message, details, 403, options);
    this.name = 'PermissionError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super('NOT_FOUND', message, details, 404, options);
    this.name = 'NotFoundError';
  }

  static forResource(resource: string, id: string): NotFoundError {
    return new NotFoundError(`${resource} with id ${id} not found`, { resource, id });
  }
}

export class NetworkError extends AppError {
  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super('NETWORK_ERROR', message, details, undefined, options);
    this.name = 'NetworkError';
  }
}

export class ServerError extends AppError {
  constructor(
    message: string,
    details?: unknown,
    statusCode = 500,
    options?: { cause?: unknown }
  ) {
    super('SERVER_ERROR', message, details, statusCode, options);
    this.name = 'ServerError';
  }
}

export class UnknownError extends AppError {
  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super('UNKNOWN_ERROR', message, details, undefined, options);
    this.name = 'UnknownError';
  }
}

export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError;
}
