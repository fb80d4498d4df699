export type ErrorCode = 'client_input' | 'backend' | 'internal' | 'batch';

/**
 * Base class for errors the router raises on purpose. Anything else reaching
 * the error handler is treated as internal.
 */
export class RouterServiceError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;

  constructor(message: string, statusCode: number, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

/** Malformed, oversized or unroutable input. The message is safe to return. */
export class ClientInputError extends RouterServiceError {
  constructor(message: string) {
    super(message, 400, 'client_input');
  }
}

export class BackendError extends RouterServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, 'backend', options);
  }
}

export class InternalError extends RouterServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, 'internal', options);
  }
}

export class BatchError extends RouterServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, 'batch', options);
  }
}
