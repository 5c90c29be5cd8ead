/**
 * Narrowing helpers for JSON request bodies.
 *
 * Each returns either the parsed value or an error message for a 400.
 */

export type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readField(body: unknown, field: string): unknown {
  return isRecord(body) ? body[field] : undefined;
}

export function parseStringArray(body: unknown, field: string): Parsed<string[]> {
  const items: unknown = readField(body, field);
  if (!Array.isArray(items)) {
    return { ok: false, error: `Invalid request body: "${field}" must be an array of strings` };
  }

  const values: string[] = [];
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (typeof item !== 'string') {
      return { ok: false, error: `Invalid ${field} at index ${i}: must be a string` };
    }
    values.push(item);
  }
  return { ok: true, value: values };
}

export function parseArray(body: unknown, field: string): Parsed<unknown[]> {
  const items: unknown = readField(body, field);
  if (!Array.isArray(items)) {
    return { ok: false, error: `Invalid request body: "${field}" must be an array` };
  }
  return { ok: true, value: items };
}

export function parseName(body: unknown): Parsed<string> {
  if (!isRecord(body) || typeof body.name !== 'string' || body.name.length === 0) {
    return { ok: false, error: 'Invalid name: must be non-empty string' };
  }
  return { ok: true, value: body.name };
}

/**
 * Optional numeric field; absent and null both mean "use the default".
 */
export function parseOptionalNumber(body: unknown, field: string): Parsed<number | undefined> {
  const value = readField(body, field);
  if (value === undefined || value === null) {
    return { ok: true, value: undefined };
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return { ok: false, error: `Invalid ${field}: must be a number` };
  }
  return { ok: true, value };
}

export interface ParsedFilterOptions {
  capacity?: number;
  hashCount?: number;
  expectedItems?: number;
  falsePositiveRate?: number;
}

export type FilterShape =
  | { kind: 'explicit'; capacity?: number; hashCount?: number }
  | { kind: 'sized'; expectedItems: number; falsePositiveRate: number };

/**
 * Filter creation body: either explicit capacity/hashCount (both optional)
 * or expectedItems and falsePositiveRate together.
 */
export function parseFilterShape(body: unknown): Parsed<FilterShape> {
  const fields = ['capacity', 'hashCount', 'expectedItems', 'falsePositiveRate'] as const;
  const values: ParsedFilterOptions = {};

  for (const field of fields) {
    const parsed = parseOptionalNumber(body, field);
    if (!parsed.ok) {
      return parsed;
    }
    if (parsed.value !== undefined) {
      values[field] = parsed.value;
    }
  }

  const { capacity, hashCount, expectedItems, falsePositiveRate } = values;
  if (expectedItems === undefined && falsePositiveRate === undefined) {
    return {
      ok: true,
      value: {
        kind: 'explicit',
        ...(capacity !== undefined && { capacity }),
        ...(hashCount !== undefined && { hashCount }),
      },
    };
  }
  if (expectedItems === undefined || falsePositiveRate === undefined) {
    return { ok: false, error: 'expectedItems and falsePositiveRate must be given together' };
  }
  return { ok: true, value: { kind: 'sized', expectedItems, falsePositiveRate } };
}
