import { createClient } from 'redis';
import { CacheEntry } from '../../types/index.js';
import { CacheStore, nowInSeconds } from './cache-store.js';

type RedisClient = ReturnType<typeof createClient>;

interface FrontRecord {
  value: string;
  expiresAt: number;
}

function parseFrontRecord(raw: string): FrontRecord | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null) return null;
    if (!('value' in parsed) || !('expiresAt' in parsed)) return null;
    const { value, expiresAt } = parsed;
    if (typeof value !== 'string' || typeof expiresAt !== 'number') return null;
    return { value, expiresAt };
  } catch {
    return null;
  }
}

export interface AcceleratedCacheStoreOptions {
  redisUrl: string;
  keyPrefix?: string;
  connectTimeoutMs?: number;
  now?: () => number;
}

/**
 * Redis front-end over a durable store.
 *
 * Reads hit Redis first and fall through to the backing store on a miss
 * or a Redis failure, backfilling Redis with the entry's absolute expiry.
 * Writes go to the backing store first; a failed front write is logged and
 * left for the next read to backfill.
 */
export class AcceleratedCacheStore implements CacheStore {
  readonly kind: string;
  private readonly client: RedisClient;
  private readonly keyPrefix: string;
  private readonly now: () => number;
  private connecting: Promise<void> | null = null;

  constructor(private readonly backing: CacheStore, options: AcceleratedCacheStoreOptions) {
    this.kind = `redis+${backing.kind}`;
    this.keyPrefix = options.keyPrefix ?? 'response:';
    this.now = options.now ?? Date.now;
    this.client = createClient({
      url: options.redisUrl,
      disableOfflineQueue: true,
      // fail fast: a missing accelerator must read as a cache miss, not a stall
      socket: { connectTimeout: options.connectTimeoutMs ?? 2000, reconnectStrategy: false }
    });
    this.client.on('error', (error: unknown) => {
      console.error('Redis accelerator error:', error);
    });
  }

  private async ensureConnected(): Promise<void> {
    if (this.client.isReady) return;
    if (!this.connecting) {
      this.connecting = this.client
        .connect()
        .then(() => undefined)
        .finally(() => {
          this.connecting = null;
        });
    }
    await this.connecting;
  }

  private frontKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  private async writeFront(entry: CacheEntry): Promise<void> {
    const record: FrontRecord = { value: entry.value, expiresAt: entry.expiresAt };
    await this.client.set(this.frontKey(entry.key), JSON.stringify(record), { EXAT: entry.expiresAt });
  }

  private async readFront(key: string): Promise<CacheEntry | null> {
    await this.ensureConnected();
    const raw = await this.client.get(this.frontKey(key));
    if (raw === null) return null;

    const record = parseFrontRecord(raw);
    if (!record || record.expiresAt <= nowInSeconds(this.now)) return null;
    return { key, value: record.value, expiresAt: record.expiresAt };
  }

  private async refreshFront(entry: CacheEntry): Promise<void> {
    try {
      await this.ensureConnected();
      await this.writeFront(entry);
    } catch (error) {
      console.error(`Redis accelerator write failed for ${entry.key}:`, error);
    }
  }

  async getItem(key: string): Promise<CacheEntry | null> {
    let entry: CacheEntry | null = null;
    try {
      entry = await this.readFront(key);
    } catch (error) {
      console.error(`Redis accelerator read failed for ${key}, using ${this.backing.kind}:`, error);
    }
    if (entry) return entry;

    entry = await this.backing.getItem(key);
    if (entry) {
      await this.refreshFront(entry);
    }
    return entry;
  }

  async putItem(entry: CacheEntry): Promise<void> {
    await this.backing.putItem(entry);
    await this.refreshFront(entry);
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
    await this.backing.close();
  }
}
