import type { z } from 'zod';
import { ValidationError } from '../types/errors.js';
import { fail, ok, type Result } from '../types/result.js';

export interface FieldIssue {
  field: string;
  message: string;
}

function toFieldIssues(error: z.ZodError): FieldIssue[] {
  return error.errors.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Validates and reports the first failing rule as the error message.
 */
export function validateFirst<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown
): Result<z.infer<S>> {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return ok(parsed.data);
  }
  const [first] = toFieldIssues(parsed.error);
  return fail(
    new ValidationError(first?.message ?? 'Invalid input', {
      field: first?.field ?? '',
    })
  );
}

/**
 * Validates and reports every failing rule under `details.errors`.
 */
export function validateAll<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  summary: string
): Result<z.infer<S>> {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return ok(parsed.data);
  }
  const issues = toFieldIssues(parsed.error);
  return fail(
    new ValidationError(summary, {
      errors: issues.map((issue) => issue.message),
      fields: issues,
    })
  );
}

/**
 * Rejects blank identifiers with "<label> cannot be empty".
 */
export function validateId(id: string, label: string): Result<string> {
  if (id.trim() === '') {
    return fail(new ValidationError(`${label} cannot be empty`));
  }
  return ok(id);
}
