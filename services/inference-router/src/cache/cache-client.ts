import { CacheStore, nowInSeconds } from './stores/cache-store.js';

export type CacheStoreProvider = () => CacheStore | null;

/**
 * Best-effort response cache.
 *
 * Store failures never reach the caller: a failed read is a miss and a
 * failed write is dropped, both logged. Without a store every read misses
 * and every write is a no-op.
 */
export class CacheClient {
  constructor(
    private readonly storeProvider: CacheStoreProvider,
    private readonly now: () => number = Date.now
  ) {}

  isEnabled(): boolean {
    return this.storeProvider() !== null;
  }

  async get(key: string): Promise<string | null> {
    const store = this.storeProvider();
    if (!store) return null;

    try {
      const entry = await store.getItem(key);
      if (!entry) return null;

      const value: unknown = JSON.parse(entry.value);
      if (typeof value !== 'string') {
        console.warn(`Cache entry ${key} holds a non-text value, treating as miss`);
        return null;
      }
      return value;
    } catch (error) {
      console.error(`Cache read error (${store.kind}) for ${key}:`, error);
      return null;
    }
  }

  async put(key: string, value: string, ttlSeconds: number): Promise<void> {
    const store = this.storeProvider();
    if (!store) return;

    try {
      await store.putItem({
        key,
        value: JSON.stringify(value),
        expiresAt: nowInSeconds(this.now) + ttlSeconds
      });
    } catch (error) {
      console.error(`Cache write error (${store.kind}) for ${key}:`, error);
    }
  }
}
