import { AcceleratedCacheStore } from '../cache/stores/accelerated-store.js';
import { CacheStore } from '../cache/stores/cache-store.js';
import { DynamoCacheStore } from '../cache/stores/dynamo-store.js';
import { InMemoryCacheStore } from '../cache/stores/in-memory-store.js';
import { BedrockInferenceBackend, InferenceBackend } from '../clients/bedrock-backend.js';
import { ServiceConfig } from '../config/environment.js';
import { BackendProvider } from '../services/backend-invoker.js';

export interface ClientFactories {
  createBackend(config: ServiceConfig): InferenceBackend;
  createCacheStore(config: ServiceConfig): CacheStore | null;
}

/**
 * Pick the cache store the configuration asks for. The accelerator only
 * fronts a durable table; without a table there is nothing to cache into.
 */
export function createConfiguredCacheStore(config: ServiceConfig): CacheStore | null {
  if (config.cacheStore === 'memory') {
    return new InMemoryCacheStore();
  }
  if (!config.cacheTableName) {
    return null;
  }

  const table = new DynamoCacheStore({
    tableName: config.cacheTableName,
    region: config.region,
    endpoint: config.dynamoEndpoint
  });

  if (config.acceleratorEndpoint) {
    return new AcceleratedCacheStore(table, { redisUrl: config.acceleratorEndpoint });
  }
  return table;
}

export const defaultClientFactories: ClientFactories = {
  createBackend: (config) => new BedrockInferenceBackend({ region: config.region }),
  createCacheStore: createConfiguredCacheStore
};

export interface ClientStatus {
  backendReady: boolean;
  cacheStore: string | null;
  initializedAt: string | null;
}

/**
 * Process-wide client handles, created on first use and reused across
 * batches. initialize() is idempotent and safe to call at the top of every
 * batch; a failed creation is retried on the next call.
 */
export class ServiceClients implements BackendProvider {
  private backend: InferenceBackend | null = null;
  private cacheStore: CacheStore | null = null;
  private cacheResolved: boolean = false;
  private initializedAt: string | null = null;

  constructor(
    private readonly config: ServiceConfig,
    private readonly factories: ClientFactories = defaultClientFactories
  ) {}

  initialize(): boolean {
    if (!this.backend) {
      try {
        this.backend = this.factories.createBackend(this.config);
        this.initializedAt = new Date().toISOString();
        console.log(`✅ Inference backend ready (region ${this.config.region})`);
      } catch (error) {
        console.error('❌ Failed to initialize inference backend:', error);
      }
    }

    if (!this.cacheResolved) {
      try {
        this.cacheStore = this.factories.createCacheStore(this.config);
        this.cacheResolved = true;
        console.log(this.cacheStore ? `✅ Using ${this.cacheStore.kind} cache` : '⚡ Response caching disabled');
      } catch (error) {
        console.error('❌ Failed to initialize cache store, caching disabled for now:', error);
      }
    }

    return this.backend !== null;
  }

  /**
   * Backend handle, re-attempting initialization once when it is missing.
   * Null means callers must fail closed.
   */
  getInferenceBackend(): InferenceBackend | null {
    if (!this.backend) {
      this.initialize();
    }
    return this.backend;
  }

  getCacheStore(): CacheStore | null {
    return this.cacheStore;
  }

  getStatus(): ClientStatus {
    return {
      backendReady: this.backend !== null,
      cacheStore: this.cacheStore ? this.cacheStore.kind : null,
      initializedAt: this.initializedAt
    };
  }

  async shutdown(): Promise<void> {
    if (this.cacheStore) {
      await this.cacheStore.close();
      this.cacheStore = null;
    }
    this.cacheResolved = false;

    if (this.backend) {
      this.backend.close();
      this.backend = null;
    }
  }
}
