import { loadServiceConfig } from './config/environment.js';
import { RouterRuntime, createRouterRuntime } from './core/router-runtime.js';
import { BatchResponse, QueueBatchEvent } from './types/index.js';

let runtime: RouterRuntime | null = null;

/**
 * Runtime shared by every batch in this process, built on first use.
 */
export function getRouterRuntime(): RouterRuntime {
  if (!runtime) {
    runtime = createRouterRuntime(loadServiceConfig(process.env));
  }
  return runtime;
}

/**
 * Queue consumer entry point: `{ Records: [{ body }] }` in, batch response out.
 * The event is checked at run time; a malformed one fails the whole batch.
 */
export async function handler(event: QueueBatchEvent): Promise<BatchResponse> {
  return getRouterRuntime().handleBatch(event);
}

export { createRouterRuntime, createBatchHandler } from './core/router-runtime.js';
export type { RouterRuntime, BatchHandler } from './core/router-runtime.js';
export { loadServiceConfig } from './config/environment.js';
export { loadRoutingConfig } from './config/routing-config.js';
export * from './types/index.js';
