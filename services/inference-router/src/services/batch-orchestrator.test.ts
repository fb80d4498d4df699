import { CacheClient } from '../cache/cache-client.js';
import { deriveCacheKey } from '../cache/cache-key.js';
import { CacheStore } from '../cache/stores/cache-store.js';
import { InMemoryCacheStore } from '../cache/stores/in-memory-store.js';
import { ErrorHandler } from '../monitoring/error-handler.js';
import { FakeInferenceBackend } from '../testing/fake-backend.js';
import { BatchResponse, BatchSuccessResponse, CacheEntry, RoutingConfig } from '../types/index.js';
import { BackendInvoker } from './backend-invoker.js';
import { BatchOrchestrator, MAX_BATCH_SIZE } from './batch-orchestrator.js';

const NOW_MS = 1_700_000_000_000;
const TTL_SECONDS = 3600;

const routingConfig: RoutingConfig = {
  agents: ['AGENT_SALES', 'AGENT_DEFAULT'],
  knowledge_bases: ['KB_SALES'],
  default_agent: 'AGENT_DEFAULT',
  routing_rules: {
    sales: { agent: 'AGENT_SALES', knowledge_base: 'KB_SALES' },
    support: {}
  }
};

function record(message: unknown, messageId = 'msg-1'): { messageId: string; body: string } {
  return { messageId, body: JSON.stringify(message) };
}

function successOf(response: BatchResponse): BatchSuccessResponse {
  if (response.statusCode !== 200) {
    throw new Error(`Expected a processed batch, got ${response.statusCode}`);
  }
  return response;
}

describe('BatchOrchestrator', () => {
  let backend: FakeInferenceBackend;
  let store: InMemoryCacheStore;
  let errorHandler: ErrorHandler;
  let orchestrator: BatchOrchestrator;
  const now = () => NOW_MS;

  function buildOrchestrator(cacheStore: CacheStore | null): BatchOrchestrator {
    const invoker = new BackendInvoker({ getInferenceBackend: () => backend }, errorHandler, {
      agentAliasId: 'TSTALIASID',
      generation: { maxTokenCount: 4096, temperature: 0.7, topP: 0.9 }
    });
    return new BatchOrchestrator(new CacheClient(() => cacheStore, now), invoker, errorHandler, {
      cacheTtlSeconds: TTL_SECONDS,
      now
    });
  }

  beforeEach(() => {
    backend = new FakeInferenceBackend();
    store = new InMemoryCacheStore(now);
    errorHandler = new ErrorHandler();
    orchestrator = buildOrchestrator(store);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('processBatch', () => {
    it('should reject an empty batch', async () => {
      const response = await orchestrator.processBatch([], routingConfig);

      expect(response).toEqual({ statusCode: 400, body: { error: 'No records found' } });
    });

    it('should answer a routed request and report the app name', async () => {
      const response = await orchestrator.processBatch(
        [record({ app_name: 'sales', request: { input: 'price?' }, session_id: 's1' })],
        routingConfig
      );

      expect(response).toEqual({
        statusCode: 200,
        results: [{ statusCode: 200, body: 'answer:price?', cached: false, app_name: 'sales' }],
        processed_count: 1
      });
      expect(backend.agentRequests).toEqual([
        { agentId: 'AGENT_SALES', agentAliasId: 'TSTALIASID', sessionId: 's1', inputText: 'price?' }
      ]);
    });

    it('should serve an identical request from the cache with the same body', async () => {
      const message = { app_name: 'sales', request: { input: 'price?' }, session_id: 's1' };

      const response = successOf(
        await orchestrator.processBatch([record(message, 'a'), record(message, 'b')], routingConfig)
      );

      expect(response.results).toEqual([
        { statusCode: 200, body: 'answer:price?', cached: false, app_name: 'sales' },
        { statusCode: 200, body: 'answer:price?', cached: true, app_name: 'sales' }
      ]);
      expect(backend.agentRequests).toHaveLength(1);
    });

    it('should key the cache on content regardless of field order or session', async () => {
      await orchestrator.processBatch(
        [record({ app_name: 'sales', request: { input: 'hi', lang: 'en' }, session_id: 's1' })],
        routingConfig
      );

      const response = successOf(
        await orchestrator.processBatch(
          [record({ app_name: 'sales', request: { lang: 'en', input: 'hi' }, session_id: 's2' })],
          routingConfig
        )
      );

      expect(response.results[0].cached).toBe(true);
      expect(backend.agentRequests).toHaveLength(1);
    });

    it('should store responses with the configured TTL', async () => {
      await orchestrator.processBatch(
        [record({ app_name: 'sales', request: { input: 'price?' }, session_id: 's1' })],
        routingConfig
      );

      const entry = await store.getItem(deriveCacheKey('sales', { input: 'price?' }));
      expect(entry).toEqual({
        key: deriveCacheKey('sales', { input: 'price?' }),
        value: '"answer:price?"',
        expiresAt: NOW_MS / 1000 + TTL_SECONDS
      });
    });

    it('should cache an empty successful body', async () => {
      backend.reply = () => [];

      const response = successOf(
        await orchestrator.processBatch(
          [
            record({ app_name: 'sales', request: { input: 'quiet' }, session_id: 's1' }),
            record({ app_name: 'sales', request: { input: 'quiet' }, session_id: 's1' })
          ],
          routingConfig
        )
      );

      expect(response.results.map((result) => result.cached)).toEqual([false, true]);
      expect(response.results[1].body).toBe('');
    });

    it('should process only the first ten records', async () => {
      const records = Array.from({ length: 15 }, (_, index) =>
        record({ app_name: 'sales', request: { input: `question ${index}` }, session_id: 's1' }, `m${index}`)
      );

      const response = successOf(await orchestrator.processBatch(records, routingConfig));

      expect(response.processed_count).toBe(MAX_BATCH_SIZE);
      expect(response.results).toHaveLength(MAX_BATCH_SIZE);
      expect(response.results[9].body).toBe('answer:question 9');
      expect(backend.agentRequests).toHaveLength(MAX_BATCH_SIZE);
      expect(console.warn).toHaveBeenCalledWith('Batch of 15 records capped at 10');
    });

    it('should isolate a failing item from its neighbours', async () => {
      const response = successOf(
        await orchestrator.processBatch(
          [
            record({ app_name: 'sales', request: { input: 'one' }, session_id: 's1' }),
            { messageId: 'broken', body: '{not json' },
            record({ app_name: 'sales', request: { input: 'three' }, session_id: 's1' })
          ],
          routingConfig
        )
      );

      expect(response.processed_count).toBe(3);
      expect(response.results.map((result) => result.statusCode)).toEqual([200, 400, 200]);
      expect(response.results[1]).toEqual({ statusCode: 400, body: { error: 'Invalid JSON format' }, cached: false });
    });

    it('should log a summary line per batch', async () => {
      await orchestrator.processBatch(
        [
          record({ app_name: 'sales', request: { input: 'one' }, session_id: 's1' }),
          record({ app_name: 'sales', request: { input: 'one' }, session_id: 's1' }),
          record({ app_name: 'bad name!', request: { input: 'one' }, session_id: 's1' })
        ],
        routingConfig
      );

      expect(console.log).toHaveBeenCalledWith('📦 Batch processed: 2 ok, 1 failed, 1 from cache');
    });

    it('should keep running metrics across batches', async () => {
      await orchestrator.processBatch(
        [
          record({ app_name: 'sales', request: { input: 'one' }, session_id: 's1' }),
          record({ app_name: 'sales', request: { input: 'one' }, session_id: 's1' })
        ],
        routingConfig
      );
      backend.failure = new Error('ServiceUnavailableException');
      await orchestrator.processBatch(
        [
          record({ app_name: 'sales', request: { input: 'two' }, session_id: 's1' }),
          record({ app_name: '', request: { input: 'two' }, session_id: 's1' })
        ],
        routingConfig
      );

      expect(orchestrator.getMetrics()).toEqual({
        batchCount: 2,
        itemCount: 4,
        cacheHits: 1,
        cacheMisses: 2,
        clientErrorCount: 1,
        serverErrorCount: 1,
        averageItemTime: 0
      });
    });
  });

  describe('processRecord', () => {
    it('should reject a body over 256 KiB before parsing it', async () => {
      const body = JSON.stringify({ app_name: 'sales', request: { input: 'x'.repeat(262_144) } });

      const result = await orchestrator.processRecord({ body }, routingConfig);

      expect(result).toEqual({ statusCode: 400, body: { error: 'Request body too large' }, cached: false });
      expect(backend.agentRequests).toHaveLength(0);
    });

    it('should reject a body that is not a string', async () => {
      const result = await orchestrator.processRecord({ body: { app_name: 'sales' } }, routingConfig);

      expect(result).toEqual({ statusCode: 400, body: { error: 'Invalid JSON format' }, cached: false });
    });

    it('should reject JSON that is not an object', async () => {
      const result = await orchestrator.processRecord({ body: '["sales"]' }, routingConfig);

      expect(result).toEqual({
        statusCode: 400,
        body: { error: 'Request body must be a JSON object' },
        cached: false
      });
    });

    it('should return the validator reason without touching cache or backend', async () => {
      const getItem = jest.spyOn(store, 'getItem');
      const putItem = jest.spyOn(store, 'putItem');

      const result = await orchestrator.processRecord(
        record({ app_name: 'sales', request: { input: 'hi' }, session_id: 'has space' }),
        routingConfig
      );

      expect(result).toEqual({
        statusCode: 400,
        body: { error: 'Invalid session_id: contains invalid characters' },
        cached: false,
        app_name: 'sales'
      });
      expect(getItem).not.toHaveBeenCalled();
      expect(putItem).not.toHaveBeenCalled();
      expect(backend.agentRequests).toHaveLength(0);
    });

    it('should omit app_name when the app name is not text', async () => {
      const result = await orchestrator.processRecord(
        record({ app_name: 42, request: { input: 'hi' } }),
        routingConfig
      );

      expect(result).toEqual({
        statusCode: 400,
        body: { error: 'Invalid app_name: must be a string' },
        cached: false
      });
    });

    it('should reject a request with no input text', async () => {
      const result = await orchestrator.processRecord(
        record({ app_name: 'sales', request: { input: '', query: null } }),
        routingConfig
      );

      expect(result).toEqual({
        statusCode: 400,
        body: { error: 'Invalid input: must not be empty' },
        cached: false,
        app_name: 'sales'
      });
    });

    it('should treat a non-object request as empty', async () => {
      const result = await orchestrator.processRecord(
        record({ app_name: 'sales', request: 'price?' }),
        routingConfig
      );

      expect(result.statusCode).toBe(400);
      expect(result.body).toEqual({ error: 'Invalid input: must not be empty' });
    });

    it('should resolve input from query when input is absent', async () => {
      await orchestrator.processRecord(
        record({ app_name: 'sales', request: { query: 'from query', prompt: 'from prompt' }, session_id: 's1' }),
        routingConfig
      );

      expect(backend.agentRequests[0].inputText).toBe('from query');
    });

    it('should apply the default app name and session id', async () => {
      const result = await orchestrator.processRecord(record({ request: { prompt: 'hello' } }), routingConfig);

      expect(result).toEqual({ statusCode: 200, body: 'answer:hello', cached: false, app_name: 'default' });
      expect(backend.agentRequests[0]).toEqual({
        agentId: 'AGENT_DEFAULT',
        agentAliasId: 'TSTALIASID',
        sessionId: 'session-1700000000',
        inputText: 'hello'
      });
    });

    it('should read a record without a body as an empty message', async () => {
      const result = await orchestrator.processRecord({ messageId: 'no-body' }, routingConfig);

      expect(result).toEqual({
        statusCode: 400,
        body: { error: 'Invalid input: must not be empty' },
        cached: false,
        app_name: 'default'
      });
    });

    it('should fall back to the default agent when the rule names none', async () => {
      await orchestrator.processRecord(
        record({ app_name: 'support', request: { input: 'help' }, session_id: 's1' }),
        routingConfig
      );

      expect(backend.agentRequests[0].agentId).toBe('AGENT_DEFAULT');
    });

    it('should report an app no agent serves', async () => {
      const result = await orchestrator.processRecord(
        record({ app_name: 'billing', request: { input: 'invoice' }, session_id: 's1' }),
        { ...routingConfig, default_agent: '' }
      );

      expect(result).toEqual({
        statusCode: 400,
        body: { error: 'No agent configured for app: billing' },
        cached: false,
        app_name: 'billing'
      });
      expect(backend.agentRequests).toHaveLength(0);
    });

    it('should redact backend failures and not cache them', async () => {
      backend.failure = new Error('AccessDeniedException: arn:aws:iam::123456789012:role/router');

      const result = await orchestrator.processRecord(
        record({ app_name: 'sales', request: { input: 'price?' }, session_id: 's1' }),
        routingConfig
      );

      expect(result).toEqual({
        statusCode: 500,
        body: { error: 'Inference service error', error_id: expect.stringMatching(/^err-\d+-[0-9a-f]{8}$/) },
        cached: false,
        app_name: 'sales'
      });
      expect(store.size()).toBe(0);
    });

    it('should still answer when the cache store fails', async () => {
      const brokenStore: CacheStore = {
        kind: 'broken',
        getItem: async (): Promise<CacheEntry | null> => {
          throw new Error('ResourceNotFoundException');
        },
        putItem: async (): Promise<void> => {
          throw new Error('ResourceNotFoundException');
        },
        close: async (): Promise<void> => undefined
      };
      const withBrokenCache = buildOrchestrator(brokenStore);

      const result = await withBrokenCache.processRecord(
        record({ app_name: 'sales', request: { input: 'price?' }, session_id: 's1' }),
        routingConfig
      );

      expect(result).toEqual({ statusCode: 200, body: 'answer:price?', cached: false, app_name: 'sales' });
    });

    it('should work without any cache store', async () => {
      const uncached = buildOrchestrator(null);
      const message = record({ app_name: 'sales', request: { input: 'price?' }, session_id: 's1' });

      await uncached.processRecord(message, routingConfig);
      const second = await uncached.processRecord(message, routingConfig);

      expect(second.cached).toBe(false);
      expect(backend.agentRequests).toHaveLength(2);
    });

    it('should turn an unexpected error into a redacted 500 and continue with the next item', async () => {
      let reads = 0;
      const flakyConfig: RoutingConfig = {
        agents: [],
        knowledge_bases: [],
        default_agent: 'AGENT_DEFAULT',
        get routing_rules(): RoutingConfig['routing_rules'] {
          reads++;
          if (reads === 1) {
            throw new Error('rules unavailable');
          }
          return {};
        }
      };

      const response = successOf(
        await orchestrator.processBatch(
          [
            record({ app_name: 'sales', request: { input: 'one' }, session_id: 's1' }, 'first'),
            record({ app_name: 'sales', request: { input: 'two' }, session_id: 's1' }, 'second')
          ],
          flakyConfig
        )
      );

      expect(response.results[0]).toEqual({
        statusCode: 500,
        body: { error: 'Internal server error', error_id: expect.stringMatching(/^err-\d+-[0-9a-f]{8}$/) },
        cached: false,
        app_name: 'sales'
      });
      expect(response.results[1]).toEqual({ statusCode: 200, body: 'answer:two', cached: false, app_name: 'sales' });

      const failedBody = response.results[0].body;
      const errorId = typeof failedBody === 'object' ? failedBody.error_id : undefined;
      expect(errorHandler.getError(errorId ?? '')?.context).toEqual({
        stage: 'record',
        appName: 'sales',
        messageId: 'first'
      });
    });
  });
});
