import { Environment } from './routing-config.js';

export type CacheStoreKind = 'dynamodb' | 'memory';

export interface GenerationConfig {
  maxTokenCount: number;
  temperature: number;
  topP: number;
}

export interface ServiceConfig {
  region: string;
  cacheStore: CacheStoreKind;
  cacheTableName?: string;
  dynamoEndpoint?: string;
  acceleratorEndpoint?: string;
  cacheTtlSeconds: number;
  agentAliasId: string;
  generation: GenerationConfig;
  port: number;
  urlPrefix: string;
  nodeEnv: string;
  shutdownTimeoutMs: number;
}

export const DEFAULT_CACHE_TTL_SECONDS = 3600;

function optionalString(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function numberSetting(
  env: Environment,
  name: string,
  fallback: number,
  accept: (value: number) => boolean
): number {
  const raw = optionalString(env, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || !accept(value)) {
    console.warn(`Ignoring invalid ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

const positiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;

/**
 * Read the service configuration from the environment. Every setting is
 * optional; invalid numbers fall back to their defaults with a warning.
 */
export function loadServiceConfig(env: Environment = process.env): ServiceConfig {
  const cacheStore: CacheStoreKind = env['CACHE_STORE']?.trim().toLowerCase() === 'memory' ? 'memory' : 'dynamodb';

  return {
    region: optionalString(env, 'AWS_REGION') ?? 'us-east-1',
    cacheStore,
    cacheTableName: optionalString(env, 'CACHE_TABLE_NAME'),
    dynamoEndpoint: optionalString(env, 'DYNAMODB_ENDPOINT'),
    acceleratorEndpoint: optionalString(env, 'ACCELERATOR_ENDPOINT'),
    cacheTtlSeconds: numberSetting(env, 'CACHE_TTL', DEFAULT_CACHE_TTL_SECONDS, positiveInteger),
    agentAliasId: optionalString(env, 'BEDROCK_AGENT_ALIAS_ID') ?? 'TSTALIASID',
    generation: {
      maxTokenCount: numberSetting(env, 'MODEL_MAX_TOKENS', 4096, positiveInteger),
      temperature: numberSetting(env, 'MODEL_TEMPERATURE', 0.7, (value) => value >= 0 && value <= 1),
      topP: numberSetting(env, 'MODEL_TOP_P', 0.9, (value) => value >= 0 && value <= 1)
    },
    port: numberSetting(env, 'PORT', 5002, positiveInteger),
    urlPrefix: optionalString(env, 'URL_PREFIX') ?? '/inference-router/api/v1',
    nodeEnv: optionalString(env, 'NODE_ENV') ?? 'development',
    shutdownTimeoutMs: numberSetting(env, 'SHUTDOWN_TIMEOUT_MS', 30000, positiveInteger)
  };
}
