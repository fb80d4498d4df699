import { InboundMessage, RequestPayload } from '../types/index.js';

export const MAX_BODY_BYTES = 256 * 1024;
export const DEFAULT_APP_NAME = 'default';

export type ParsedBody = { ok: true; message: InboundMessage } | { ok: false; reason: string };

export interface ExtractedRequest {
  appName: unknown;
  sessionId: unknown;
  inputText: unknown;
  payload: RequestPayload;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Empty containers, false and 0 count as absent, like null and ''
function isPresent(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isPlainObject(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

export function getMessageId(record: unknown): string | undefined {
  if (!isPlainObject(record)) return undefined;
  const messageId = record['messageId'];
  return typeof messageId === 'string' ? messageId : undefined;
}

/**
 * Decode a queue record's body into a message object. A record without a
 * body reads as `{}`; size is checked on the raw text before parsing.
 */
export function parseRecordBody(record: unknown): ParsedBody {
  const rawBody = isPlainObject(record) ? record['body'] ?? '{}' : undefined;
  if (typeof rawBody !== 'string') {
    return { ok: false, reason: 'Invalid JSON format' };
  }

  if (Buffer.byteLength(rawBody, 'utf8') > MAX_BODY_BYTES) {
    return { ok: false, reason: 'Request body too large' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody);
  } catch {
    return { ok: false, reason: 'Invalid JSON format' };
  }

  if (!isPlainObject(parsed)) {
    return { ok: false, reason: 'Request body must be a JSON object' };
  }
  return { ok: true, message: parsed };
}

/**
 * The first of `input`, `query`, `prompt` that is non-empty, or ''.
 */
export function resolveInputText(payload: RequestPayload): unknown {
  for (const candidate of [payload.input, payload.query, payload.prompt]) {
    if (isPresent(candidate)) return candidate;
  }
  return '';
}

/**
 * Apply field defaults. Values are returned as found (still unknown) so the
 * validator can report on their type.
 */
export function extractRequest(message: InboundMessage, now: () => number = Date.now): ExtractedRequest {
  const payload: RequestPayload = isPlainObject(message.request) ? message.request : {};

  return {
    appName: message.app_name === undefined ? DEFAULT_APP_NAME : message.app_name,
    sessionId: message.session_id === undefined ? `session-${Math.floor(now() / 1000)}` : message.session_id,
    inputText: resolveInputText(payload),
    payload
  };
}
