import { CacheClient } from '../cache/cache-client.js';
import { deriveCacheKey } from '../cache/cache-key.js';
import { ErrorHandler } from '../monitoring/error-handler.js';
import { InternalError } from '../monitoring/errors.js';
import { routeRequest } from '../routing/router.js';
import { BatchMetrics, BatchResponse, InvocationResult, NormalizedRequest, RoutingConfig } from '../types/index.js';
import { validateRequest } from '../validation/validator.js';
import { BackendInvoker } from './backend-invoker.js';
import { extractRequest, getMessageId, parseRecordBody } from './message-parser.js';

export const MAX_BATCH_SIZE = 10;

export interface BatchOrchestratorOptions {
  cacheTtlSeconds: number;
  now?: () => number;
}

type NormalizeOutcome = { ok: true; request: NormalizedRequest } | { ok: false; reason: string };

function clientError(reason: string, appName?: string): InvocationResult {
  return {
    statusCode: 400,
    body: { error: reason },
    cached: false,
    ...(appName !== undefined ? { app_name: appName } : {})
  };
}

/**
 * Drives queue records through validate → cache → route → invoke → cache.
 *
 * Items run one at a time in arrival order. Every item produces exactly one
 * result; a failing item never stops the ones after it.
 */
export class BatchOrchestrator {
  private readonly now: () => number;
  private metrics: BatchMetrics = {
    batchCount: 0,
    itemCount: 0,
    cacheHits: 0,
    cacheMisses: 0,
    clientErrorCount: 0,
    serverErrorCount: 0,
    averageItemTime: 0
  };

  constructor(
    private readonly cacheClient: CacheClient,
    private readonly invoker: BackendInvoker,
    private readonly errorHandler: ErrorHandler,
    private readonly options: BatchOrchestratorOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async processBatch(records: readonly unknown[], routingConfig: RoutingConfig): Promise<BatchResponse> {
    if (records.length === 0) {
      return { statusCode: 400, body: { error: 'No records found' } };
    }

    if (records.length > MAX_BATCH_SIZE) {
      console.warn(`Batch of ${records.length} records capped at ${MAX_BATCH_SIZE}`);
    }
    const batch = records.slice(0, MAX_BATCH_SIZE);

    const results: InvocationResult[] = [];
    for (const record of batch) {
      const started = this.now();
      const result = await this.processRecord(record, routingConfig);
      this.recordOutcome(result, this.now() - started);
      results.push(result);
    }
    this.metrics.batchCount++;

    const failed = results.filter((result) => result.statusCode !== 200).length;
    const cached = results.filter((result) => result.cached).length;
    console.log(`📦 Batch processed: ${results.length - failed} ok, ${failed} failed, ${cached} from cache`);

    return { statusCode: 200, results, processed_count: results.length };
  }

  /**
   * Process one record. Never throws: unexpected errors become a redacted
   * 500 carrying a correlation id.
   */
  async processRecord(record: unknown, routingConfig: RoutingConfig): Promise<InvocationResult> {
    let appName: string | undefined;

    try {
      const parsed = parseRecordBody(record);
      if (!parsed.ok) {
        return clientError(parsed.reason);
      }

      const extracted = extractRequest(parsed.message, this.now);
      if (typeof extracted.appName === 'string') {
        appName = extracted.appName;
      }

      const normalized = this.normalize(extracted.appName, extracted.inputText, extracted.sessionId, extracted.payload);
      if (!normalized.ok) {
        return clientError(normalized.reason, appName);
      }
      const request = normalized.request;

      // Only validated requests reach the cache, so invalid ones are never stored
      const cacheKey = deriveCacheKey(request.appName, request.payload);
      const cachedBody = await this.cacheClient.get(cacheKey);
      if (cachedBody !== null) {
        return { statusCode: 200, body: cachedBody, cached: true, app_name: request.appName };
      }
      this.metrics.cacheMisses++;

      const decision = routeRequest(request.appName, routingConfig);
      if (!decision) {
        return clientError(`No agent configured for app: ${request.appName}`, request.appName);
      }

      const result = await this.invoker.invokeAgent(decision.agentId, request.sessionId, request.inputText);

      if (result.statusCode === 200 && typeof result.body === 'string') {
        await this.cacheClient.put(cacheKey, result.body, this.options.cacheTtlSeconds);
      }

      return { ...result, app_name: request.appName };
    } catch (error) {
      const errorInfo = this.errorHandler.captureError(error, {
        stage: 'record',
        appName,
        messageId: getMessageId(record)
      });
      return {
        statusCode: 500,
        body: { error: 'Internal server error', error_id: errorInfo.id },
        cached: false,
        ...(appName !== undefined ? { app_name: appName } : {})
      };
    }
  }

  private normalize(appName: unknown, inputText: unknown, sessionId: unknown, payload: NormalizedRequest['payload']): NormalizeOutcome {
    const validation = validateRequest(appName, inputText, sessionId);
    if (!validation.ok) {
      return validation;
    }

    if (typeof appName !== 'string' || typeof inputText !== 'string' || typeof sessionId !== 'string') {
      throw new InternalError('Validated request carries non-text identifiers');
    }

    return { ok: true, request: { appName, inputText, sessionId, payload } };
  }

  private recordOutcome(result: InvocationResult, elapsedMs: number): void {
    const metrics = this.metrics;
    metrics.itemCount++;
    metrics.averageItemTime += (elapsedMs - metrics.averageItemTime) / metrics.itemCount;

    if (result.cached) {
      metrics.cacheHits++;
    } else if (result.statusCode >= 500) {
      metrics.serverErrorCount++;
    } else if (result.statusCode >= 400) {
      metrics.clientErrorCount++;
    }
  }

  getMetrics(): BatchMetrics {
    return { ...this.metrics };
  }
}
