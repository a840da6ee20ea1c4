import { createHash } from 'node:crypto';

/**
 * Serializes a value as JSON with object keys sorted, so equal values always
 * produce the same string. Properties holding `undefined` are dropped, as
 * `JSON.stringify` would.
 */
export function canonicalize(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value ?? null);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalize(item)).join(',')}]`;
  }

  const fields: [string, unknown][] = Object.entries(value);
  const entries = fields
    .filter(([, val]) => val !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const serialized = entries
    .map(([key, val]) => `${JSON.stringify(key)}:${canonicalize(val)}`)
    .join(',');
  return `{${serialized}}`;
}

export function checksumFrom(value: unknown, algorithm: string = 'sha256'): string {
  return createHash(algorithm).update(canonicalize(value)).digest('hex');
}

export function checksumOfText(text: string, algorithm: string = 'sha256'): string {
  return createHash(algorithm).update(text, 'utf8').digest('hex');
}
