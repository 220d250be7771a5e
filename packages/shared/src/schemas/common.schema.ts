import { z } from 'zod';

export function requiredText(emptyMessage: string, max?: { length: number; message: string }) {
  const base = z.string().trim().min(1, emptyMessage);
  return max === undefined ? base : base.max(max.length, max.message);
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export const isoDateStringSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid date' });
