import { createHash } from 'crypto';

/**
 * JSON serialization with object keys sorted at every level, so that two
 * structurally equal values always serialize to the same string.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, item]) => item !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);

  return `{${entries.join(',')}}`;
}

/**
 * Cache key for a derived result: `<prefix>:<md5(query:data)>`.
 */
export function hashKey(prefix: string, query: string, data: unknown): string {
  const digest = createHash('md5')
    .update(`${query}:${stableStringify(data)}`)
    .digest('hex');
  return `${prefix}:${digest}`;
}
