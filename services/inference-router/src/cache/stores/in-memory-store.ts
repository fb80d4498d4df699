import { CacheEntry } from '../../types/index.js';
import { CacheStore, nowInSeconds } from './cache-store.js';

/**
 * In-memory cache (dev/local use)
 */
export class InMemoryCacheStore implements CacheStore {
  readonly kind = 'memory';
  private entries = new Map<string, CacheEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async getItem(key: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAt <= nowInSeconds(this.now)) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  async putItem(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.key, { ...entry });
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }
}
