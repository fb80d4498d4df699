// Queue Types
export interface QueueRecord {
  messageId?: string;
  body?: unknown;
  [attribute: string]: unknown;
}

export interface QueueBatchEvent {
  Records?: QueueRecord[];
}

// Request Types
/**
 * Loosely shaped request payload. The three text fields are named so that
 * input resolution happens in one place; any other field is carried through
 * untouched and still participates in the cache key.
 */
export interface RequestPayload {
  input?: unknown;
  query?: unknown;
  prompt?: unknown;
  [field: string]: unknown;
}

export interface InboundMessage {
  app_name?: unknown;
  request?: unknown;
  session_id?: unknown;
}

export interface NormalizedRequest {
  appName: string;
  inputText: string;
  sessionId: string;
  payload: RequestPayload;
}

// Routing Types
export interface RoutingRule {
  agent?: string;
  knowledge_base?: string;
}

export interface RoutingConfig {
  agents: string[];
  knowledge_bases: string[];
  default_agent: string;
  routing_rules: Record<string, RoutingRule>;
}

export interface RoutingDecision {
  agentId: string;
  knowledgeBaseId?: string;
}

// Cache Types
export interface CacheEntry {
  key: string;
  value: string;
  expiresAt: number; // epoch seconds
}

// Result Types
export interface ErrorBody {
  error: string;
  error_id?: string;
}

export interface InvocationResult {
  statusCode: number;
  body: string | ErrorBody;
  cached: boolean;
  app_name?: string;
}

export interface BatchSuccessResponse {
  statusCode: 200;
  results: InvocationResult[];
  processed_count: number;
}

export interface BatchErrorResponse {
  statusCode: 400 | 500;
  body: ErrorBody;
}

export type BatchResponse = BatchSuccessResponse | BatchErrorResponse;

// Metrics Types
export interface BatchMetrics {
  batchCount: number;
  itemCount: number;
  cacheHits: number;
  cacheMisses: number;
  clientErrorCount: number;
  serverErrorCount: number;
  averageItemTime: number; // milliseconds
}
