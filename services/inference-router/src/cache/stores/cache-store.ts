import { CacheEntry } from '../../types/index.js';

/**
 * Contract for every cache backend. Implementations own expiry: an entry
 * whose expiresAt has passed must come back as null.
 */
export interface CacheStore {
  readonly kind: string;
  getItem(key: string): Promise<CacheEntry | null>;
  putItem(entry: CacheEntry): Promise<void>;
  close(): Promise<void>;
}

export function nowInSeconds(now: () => number = Date.now): number {
  return Math.floor(now() / 1000);
}
