import { z } from 'zod';

export const DEFAULT_PAGE_SIZE = 30;
export const MAX_PAGE_SIZE = 100;
export const MAX_CALENDAR_PAGE_SIZE = 500;

function perPageSchema(max: number): z.ZodNumber {
  const message = `Items per page must be between 1 and ${max}`;
  return z.number().int().min(1, message).max(max, message);
}

export const paginationSchema = z.object({
  page: z.number().int().min(1, 'Page number must be greater than 0'),
  perPage: perPageSchema(MAX_PAGE_SIZE),
});

export const calendarPaginationSchema = z.object({
  page: z.number().int().min(1, 'Page number must be greater than 0'),
  perPage: perPageSchema(MAX_CALENDAR_PAGE_SIZE),
});

export const recentLimitSchema = z
  .number()
  .int()
  .min(1, 'Limit must be between 1 and 50')
  .max(50, 'Limit must be between 1 and 50');

export type PaginationInput = z.infer<typeof paginationSchema>;

/**
 * Offset/limit window as the list notifiers request it.
 */
export interface PageRequest {
  offset: number;
  limit: number;
}

/**
 * Converts an offset window into the 1-based page that contains its first
 * item. Offsets that are not a multiple of the limit round down, so callers
 * must drop items they already hold.
 */
export function pageForOffset(request: PageRequest): PaginationInput {
  return {
    page: Math.floor(request.offset / request.limit) + 1,
    perPage: request.limit,
  };
}
