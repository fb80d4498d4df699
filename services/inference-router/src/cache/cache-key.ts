import { createHash } from 'node:crypto';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isPlainObject(value)) {
    // fromEntries defines own properties, so a `__proto__` key is kept
    return Object.fromEntries(Object.keys(value).sort().map((key) => [key, sortKeys(value[key])]));
  }
  return value;
}

/**
 * JSON with object keys sorted at every depth. Two payloads that differ only
 * in field order serialize identically.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value)) ?? 'null';
}

/**
 * Content-addressed cache key for an (application, request) pair.
 */
export function deriveCacheKey(appName: string, payload: unknown): string {
  const keySource = `${appName}:${canonicalJson(payload)}`;
  return createHash('sha256').update(keySource, 'utf8').digest('hex');
}
