import { createHash } from 'node:crypto';

function canonicalize(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'undefined';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalize(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
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

export type QueryValue = string | number | boolean | undefined;

/**
 * Cache key for a request: `"<METHOD> <path>"`, then the query parameters sorted by name
 * (undefined values dropped), then `#<checksum>` of the body when there is one.
 */
export function requestFingerprint(
  method: string,
  path: string,
  query: Record<string, QueryValue> = {},
  body?: unknown,
): string {
  const search = toSearchParams(query);
  search.sort();
  const serialized = search.toString();
  const queryPart = serialized ? `?${serialized}` : '';
  const bodyPart = body === undefined ? '' : `#${checksumFrom(body)}`;
  return `${method.toUpperCase()} ${path}${queryPart}${bodyPart}`;
}

export function toSearchParams(query: Record<string, QueryValue>): URLSearchParams {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      search.set(key, String(value));
    }
  }
  return search;
}
