import type { AppError } from '@periolifts/shared';

/**
 * A fetched list. `items` is the last good list in every status, so a view
 * can keep showing it while loading or after a failure.
 */
export type ResourceListState<T> =
  | { status: 'loading'; items: T[] }
  | { status: 'data'; items: T[] }
  | { status: 'error'; error: AppError; items: T[] };

export function loadingState<T>(items: T[] = []): ResourceListState<T> {
  return { status: 'loading', items };
}

export function dataState<T>(items: T[]): ResourceListState<T> {
  return { status: 'data', items };
}

export function errorState<T>(error: AppError, items: T[]): ResourceListState<T> {
  return { status: 'error', error, items };
}
