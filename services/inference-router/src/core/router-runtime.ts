import { CacheClient } from '../cache/cache-client.js';
import { ServiceConfig } from '../config/environment.js';
import { Environment, loadRoutingConfig } from '../config/routing-config.js';
import { ErrorHandler } from '../monitoring/error-handler.js';
import { BatchError } from '../monitoring/errors.js';
import { BackendInvoker } from '../services/backend-invoker.js';
import { BatchOrchestrator } from '../services/batch-orchestrator.js';
import { BatchResponse, RoutingConfig } from '../types/index.js';
import { ClientFactories, ServiceClients, defaultClientFactories } from './service-clients.js';

export type BatchHandler = (event: unknown) => Promise<BatchResponse>;

export interface BatchHandlerDependencies {
  clients: Pick<ServiceClients, 'initialize'>;
  orchestrator: Pick<BatchOrchestrator, 'processBatch'>;
  errorHandler: ErrorHandler;
  loadRoutingConfig: () => RoutingConfig;
}

function readRecords(event: unknown): unknown[] {
  if (typeof event !== 'object' || event === null) {
    throw new BatchError('Batch event is not an object');
  }
  if (!('Records' in event) || event.Records === undefined) {
    return [];
  }
  if (!Array.isArray(event.Records)) {
    throw new BatchError('Batch event Records is not a list');
  }
  return event.Records;
}

/**
 * Entry point for one queue batch. Initializes clients, loads routing for
 * this batch and hands the records to the orchestrator. Anything thrown on
 * the way becomes a single redacted 500 for the whole batch.
 */
export function createBatchHandler(deps: BatchHandlerDependencies): BatchHandler {
  return async (event: unknown): Promise<BatchResponse> => {
    try {
      deps.clients.initialize();
      const routingConfig = deps.loadRoutingConfig();

      const records = readRecords(event);
      if (records.length === 0) {
        return { statusCode: 400, body: { error: 'No records found' } };
      }

      return await deps.orchestrator.processBatch(records, routingConfig);
    } catch (error) {
      const batchError = error instanceof BatchError
        ? error
        : new BatchError(`Batch processing failed: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
      const errorInfo = deps.errorHandler.captureError(batchError, { stage: 'batch' });
      return { statusCode: 500, body: { error: 'Internal server error', error_id: errorInfo.id } };
    }
  };
}

export interface RouterRuntime {
  config: ServiceConfig;
  clients: ServiceClients;
  errorHandler: ErrorHandler;
  cacheClient: CacheClient;
  invoker: BackendInvoker;
  orchestrator: BatchOrchestrator;
  handleBatch: BatchHandler;
}

export interface RouterRuntimeOptions {
  env?: Environment;
  factories?: ClientFactories;
  errorHandler?: ErrorHandler;
  now?: () => number;
}

/**
 * Wire the router's components for one process.
 */
export function createRouterRuntime(config: ServiceConfig, options: RouterRuntimeOptions = {}): RouterRuntime {
  const env = options.env ?? process.env;
  const errorHandler = options.errorHandler ?? new ErrorHandler({ exposeDetails: config.nodeEnv === 'development' });
  const clients = new ServiceClients(config, options.factories ?? defaultClientFactories);
  const cacheClient = new CacheClient(() => clients.getCacheStore(), options.now);
  const invoker = new BackendInvoker(clients, errorHandler, {
    agentAliasId: config.agentAliasId,
    generation: config.generation
  });
  const orchestrator = new BatchOrchestrator(cacheClient, invoker, errorHandler, {
    cacheTtlSeconds: config.cacheTtlSeconds,
    now: options.now
  });

  const handleBatch = createBatchHandler({
    clients,
    orchestrator,
    errorHandler,
    loadRoutingConfig: () => loadRoutingConfig(env)
  });

  return { config, clients, errorHandler, cacheClient, invoker, orchestrator, handleBatch };
}
