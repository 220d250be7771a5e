/**
 * PocketBase filter expressions. Values are always quoted and escaped here;
 * callers never interpolate raw input.
 */

export type FilterValue = string | number | boolean | Date;

function escapeText(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/[\r\n]+/g, ' ');
}

/**
 * PocketBase stores datetimes as "YYYY-MM-DD HH:MM:SS.sssZ".
 */
export function formatFilterDate(date: Date): string {
  return date.toISOString().replace('T', ' ');
}

export function literal(value: FilterValue): string {
  if (value instanceof Date) {
    return `"${formatFilterDate(value)}"`;
  }
  if (typeof value === 'string') {
    return `"${escapeText(value)}"`;
  }
  return String(value);
}

export type FilterOperator = '=' | '!=' | '>' | '>=' | '<' | '<=' | '~' | '!~';

export function compare(field: string, operator: FilterOperator, value: FilterValue): string {
  return `${field} ${operator} ${literal(value)}`;
}

export function eq(field: string, value: FilterValue): string {
  return compare(field, '=', value);
}

export function like(field: string, value: string): string {
  return compare(field, '~', value);
}

export function anyOf(filters: string[]): string {
  const present = filters.filter((filter) => filter !== '');
  if (present.length <= 1) {
    return present[0] ?? '';
  }
  return `(${present.join(' || ')})`;
}

/**
 * Joins non-empty filters with AND, parenthesising each when there are
 * several.
 */
export function combineFilters(filters: Array<string | null | undefined>): string {
  const present = filters.filter((filter): filter is string => filter !== undefined && filter !== null && filter !== '');
  if (present.length <= 1) {
    return present[0] ?? '';
  }
  return present.map((filter) => `(${filter})`).join(' && ');
}

export function userFilter(userId: string, field = 'user_id'): string {
  return eq(field, userId);
}
