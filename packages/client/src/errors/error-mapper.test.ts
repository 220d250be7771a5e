import { describe, it, expect } from 'vitest';
import { ClientResponseError } from 'pocketbase';
import { AppwriteException } from 'node-appwrite';
import { NotFoundError } from '@periolifts/shared';
import { extractPocketBaseMessage, toAppError } from './error-mapper.js';
import { friendlyAuthMessage, toAuthError } from './auth-messages.js';

function pocketBaseError(status: number, response: Record<string, unknown>): ClientResponseError {
  return new ClientResponseError({ url: 'http://localhost:8090/api/x', status, response });
}

describe('toAppError', () => {
  it('should map PocketBase statuses to error kinds', () => {
    expect(toAppError(pocketBaseError(400, {}), 'x').code).toBe('VALIDATION_ERROR');
    expect(toAppError(pocketBaseError(401, {}), 'x').code).toBe('AUTHENTICATION_ERROR');
    expect(toAppError(pocketBaseError(403, {}), 'x').code).toBe('PERMISSION_ERROR');
    expect(toAppError(pocketBaseError(404, {}), 'x').code).toBe('NOT_FOUND');
    expect(toAppError(pocketBaseError(409, {}), 'x').code).toBe('VALIDATION_ERROR');
    expect(toAppError(pocketBaseError(503, {}), 'x').code).toBe('SERVER_ERROR');
    expect(toAppError(pocketBaseError(0, {}), 'x').code).toBe('NETWORK_ERROR');
  });

  it('should use default messages when the response has none', () => {
    expect(toAppError(pocketBaseError(400, {}), 'x').message).toBe('Invalid request data');
    expect(toAppError(pocketBaseError(403, {}), 'x').message).toBe('Permission denied');
    expect(toAppError(pocketBaseError(418, {}), 'x').message).toBe('Client error');
    expect(toAppError(pocketBaseError(0, {}), 'x').message).toBe('Network error');
  });

  it('should prefer field errors over the response message', () => {
    const response = {
      message: 'Failed to create record.',
      data: {
        name: { code: 'validation_required', message: 'Missing required value.' },
        email: { code: 'validation_invalid_email', message: 'Must be a valid email address.' },
      },
    };

    const error = toAppError(pocketBaseError(400, response), 'x');

    expect(error.message).toBe(
      'name: Missing required value., email: Must be a valid email address.'
    );
    expect(error.details).toEqual({ statusCode: 400, response });
    expect(error.statusCode).toBe(400);
  });

  it('should map Appwrite exceptions by code', () => {
    const error = toAppError(
      new AppwriteException('Document not found', 404, 'document_not_found'),
      'x'
    );

    expect(error.code).toBe('NOT_FOUND');
    expect(error.message).toBe('Document not found');
  });

  it('should pass AppErrors through and wrap anything else', () => {
    const notFound = new NotFoundError('gone');
    expect(toAppError(notFound, 'x')).toBe(notFound);

    const cause = new TypeError('boom');
    const wrapped = toAppError(cause, 'Failed to load workouts');
    expect(wrapped.code).toBe('UNKNOWN_ERROR');
    expect(wrapped.message).toBe('Failed to load workouts');
    expect(wrapped.cause).toBe(cause);
  });
});

describe('extractPocketBaseMessage', () => {
  it('should return an empty string for unknown shapes', () => {
    expect(extractPocketBaseMessage(null)).toBe('');
    expect(extractPocketBaseMessage({ data: { name: 'oops' } })).toBe('');
  });
});

describe('auth messages', () => {
  it('should rewrite known auth failures', () => {
    expect(friendlyAuthMessage('Failed to authenticate.')).toBe(
      'Invalid email or password. Please try again.'
    );
    expect(friendlyAuthMessage('email: Value must be unique.')).toBe(
      'An account with this email already exists.'
    );
    expect(friendlyAuthMessage('')).toBe('Authentication failed. Please try again.');
    expect(friendlyAuthMessage('Something else')).toBe('Something else');
  });

  it('should keep the error kind', () => {
    const error = toAuthError(toAppError(pocketBaseError(400, { message: 'Failed to authenticate.' }), 'x'));

    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('Invalid email or password. Please try again.');
  });
});
