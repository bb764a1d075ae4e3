/**
 * Helpers for reading loosely shaped provider payloads.
 *
 * Providers expose the same logical field under different keys depending on
 * the endpoint and API version, so every field is read through an ordered
 * alias list instead of ad hoc `a || b || c` chains.
 */

export type PayloadRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is PayloadRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Coerce a numeric-looking value to a finite number, or 0
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return 0;
}

/**
 * First alias holding a non-empty string
 */
export function resolveString(
  record: PayloadRecord,
  aliases: readonly string[]
): string | undefined {
  for (const alias of aliases) {
    const value = record[alias];
    if (typeof value === 'string' && value.trim() !== '') {
      return value.trim();
    }
  }
  return undefined;
}

/**
 * First alias that coerces to a non-zero number. A zero or unparseable value
 * falls through to the next alias; 0 when none qualifies.
 */
export function resolveNumber(record: PayloadRecord, aliases: readonly string[]): number {
  for (const alias of aliases) {
    const value = toNumber(record[alias]);
    if (value !== 0) {
      return value;
    }
  }
  return 0;
}

/**
 * Like resolveNumber, but reports whether any alias carried a value at all
 */
export function resolveOptionalNumber(
  record: PayloadRecord,
  aliases: readonly string[]
): number | undefined {
  const present = aliases.some(alias => record[alias] !== undefined && record[alias] !== null);
  return present ? resolveNumber(record, aliases) : undefined;
}

/**
 * Read a dotted path (`data.tokens`) from a payload
 */
export function readPath(payload: unknown, path: string): unknown {
  let current: unknown = payload;
  for (const key of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

/**
 * Find the list inside a response: the body itself when it is an array,
 * otherwise the first array found under one of the container paths.
 */
export function extractList(payload: unknown, containerPaths: readonly string[]): unknown[] {
  if (Array.isArray(payload)) {
    return payload;
  }
  for (const path of containerPaths) {
    const candidate = readPath(payload, path);
    if (Array.isArray(candidate)) {
      return candidate;
    }
  }
  return [];
}

/**
 * Only the entries of a list that are plain objects
 */
export function recordsOf(list: unknown[]): PayloadRecord[] {
  return list.filter(isRecord);
}
