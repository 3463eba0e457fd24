/**
 * Representation-insensitive canonical form for document values.
 *
 * - numeric strings ('12', ' 12.50 ', '12,5', '1 234') become numbers; a comma
 *   followed by exactly three digits ('1,000') is ambiguous between a decimal
 *   comma and a thousands separator and stays a string
 * - object keys are sorted; ignored keys and undefined values are dropped
 * - arrays are compared as multisets, so per-party entries may arrive in any order
 */

export type NormalizedValue =
  | null
  | boolean
  | number
  | string
  | NormalizedValue[]
  | { [key: string]: NormalizedValue };

const NUMERIC_STRING = /^[-+]?(?:\d+(?:[.,]\d+)?|[.,]\d+)$/;
// Space, no-break space or narrow no-break space between groups of three digits
const GROUPED_NUMBER = /^[-+]?\d{1,3}(?:[ \u00A0\u202F]\d{3})+(?:[.,]\d+)?$/;
const AMBIGUOUS_COMMA = /^[-+]?\d{1,3},\d{3}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeNumber(value: number): NormalizedValue {
  if (!Number.isFinite(value)) return String(value);
  return Object.is(value, -0) ? 0 : value;
}

function normalizeString(value: string): NormalizedValue {
  const trimmed = value.trim();
  if (GROUPED_NUMBER.test(trimmed)) {
    return normalizeNumber(Number(trimmed.replace(/[ \u00A0\u202F]/g, '').replace(',', '.')));
  }
  if (AMBIGUOUS_COMMA.test(trimmed)) return trimmed;
  if (NUMERIC_STRING.test(trimmed)) {
    return normalizeNumber(Number(trimmed.replace(',', '.')));
  }
  return trimmed;
}

export function normalizeValue(value: unknown, ignore: ReadonlySet<string>): NormalizedValue {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'number':
      return normalizeNumber(value);
    case 'string':
      return normalizeString(value);
    case 'boolean':
      return value;
    case 'bigint':
      return normalizeNumber(Number(value));
    default:
      break;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    return value
      .map((item) => normalizeValue(item, ignore))
      .map((item) => ({ item, key: JSON.stringify(item) }))
      .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
      .map(({ item }) => item);
  }

  if (isRecord(value)) {
    const out: { [key: string]: NormalizedValue } = {};
    for (const key of Object.keys(value).sort()) {
      if (ignore.has(key)) continue;
      const child = value[key];
      if (child === undefined || typeof child === 'function') continue;
      out[key] = normalizeValue(child, ignore);
    }
    return out;
  }

  return String(value);
}

/**
 * Canonical string of a value; equal strings mean semantically equal values.
 */
export function canonicalize(value: unknown, ignore: ReadonlySet<string> = new Set()): string {
  return JSON.stringify(normalizeValue(value, ignore));
}

/**
 * Read a dotted path ('stemmer.total') from a document.
 */
export function readPath(document: unknown, path: string): unknown {
  let current: unknown = document;
  for (const segment of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}
