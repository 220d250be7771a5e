export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(data: Record<string, unknown>, key: string): string | null {
  const value = data[key];
  if (typeof value === 'string') {
    return value;
  }
  return null;
}

export function readNumber(data: Record<string, unknown>, key: string): number | null {
  const value = data[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  return null;
}

export function readBoolean(data: Record<string, unknown>, key: string): boolean | null {
  const value = data[key];
  if (typeof value === 'boolean') {
    return value;
  }
  return null;
}

/**
 * Storage APIs return "" for unset text and date fields.
 */
export function readOptionalString(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  if (typeof value === 'string' && value !== '') {
    return value;
  }
  return undefined;
}

export function readStringArray(data: Record<string, unknown>, key: string): string[] | null {
  const value = data[key];
  if (!Array.isArray(value)) {
    return null;
  }
  return value.filter((entry): entry is string => typeof entry === 'string');
}

/**
 * JSON fields may arrive decoded or as their serialised text.
 */
export function decodeJson(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  if (value.trim() === '') {
    return null;
  }
  try {
    const decoded: unknown = JSON.parse(value);
    return decoded;
  } catch {
    return null;
  }
}

export function isStringLiteral<T extends string>(
  allowed: readonly T[],
  value: string
): value is T {
  return allowed.some((entry) => entry === value);
}
