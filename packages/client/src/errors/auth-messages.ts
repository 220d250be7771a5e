import { AppError, AuthenticationError, ValidationError } from '@periolifts/shared';

const AUTH_MESSAGES: Array<{ patterns: string[]; message: string }> = [
  {
    patterns: ['invalid credentials', 'invalid login credentials', 'failed to authenticate'],
    message: 'Invalid email or password. Please try again.',
  },
  { patterns: ['user not found'], message: 'No account found with this email address.' },
  {
    patterns: [
      'email already exists',
      'email_already_exists',
      'value must be unique',
      'a user with the same id, email',
    ],
    message: 'An account with this email already exists.',
  },
  { patterns: ['password too short'], message: 'Password must be at least 8 characters long.' },
  { patterns: ['invalid email'], message: 'Please enter a valid email address.' },
];

export function friendlyAuthMessage(message: string): string {
  const lower = message.toLowerCase();
  const match = AUTH_MESSAGES.find(({ patterns }) =>
    patterns.some((pattern) => lower.includes(pattern))
  );
  if (match !== undefined) {
    return match.message;
  }
  return message === '' ? 'Authentication failed. Please try again.' : message;
}

/**
 * Rewrites backend auth failures into user-facing messages while keeping
 * the error kind.
 */
export function toAuthError(error: AppError): AppError {
  const message = friendlyAuthMessage(error.message);
  if (error.code === 'VALIDATION_ERROR') {
    return new ValidationError(message, error.details, { cause: error });
  }
  if (error.code === 'AUTHENTICATION_ERROR' || error.code === 'NOT_FOUND') {
    return new AuthenticationError(message, error.details, { cause: error });
  }
  return error;
}
