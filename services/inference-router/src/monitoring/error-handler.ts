import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { RouterServiceError } from './errors.js';

export interface ErrorContext {
  url?: string;
  method?: string;
  appName?: string;
  sessionId?: string;
  agentId?: string;
  modelId?: string;
  messageId?: string;
  stage?: string;
}

export interface ErrorInfo {
  id: string;
  timestamp: string;
  type: string;
  message: string;
  stack?: string;
  context: ErrorContext;
  severity: 'low' | 'medium' | 'high' | 'critical';
}

export interface ErrorStats {
  total: number;
  bySeverity: Record<string, number>;
  byType: Record<string, number>;
}

export interface ErrorHandlerOptions {
  maxStoredErrors: number;
  exposeDetails: boolean;
}

export class ErrorHandler {
  private errors: Map<string, ErrorInfo> = new Map();
  private options: ErrorHandlerOptions;

  constructor(options: Partial<ErrorHandlerOptions> = {}) {
    this.options = {
      maxStoredErrors: 500,
      exposeDetails: false,
      ...options
    };
  }

  /**
   * Express error handling middleware.
   * Client input errors keep their message; everything else is redacted to
   * a generic message plus the error id.
   */
  middleware() {
    return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
      const errorInfo = this.captureError(error, {
        url: req.originalUrl,
        method: req.method
      });

      const statusCode = error instanceof RouterServiceError ? error.statusCode : 500;
      const message = statusCode < 500 ? errorInfo.message : 'Internal server error';

      res.status(statusCode).json({
        error: message,
        error_id: errorInfo.id,
        timestamp: errorInfo.timestamp,
        ...(this.options.exposeDetails ? {
          stack: errorInfo.stack,
          context: errorInfo.context
        } : {})
      });
    };
  }

  /**
   * Record an error under a fresh correlation id and log the full detail.
   * Only the returned id is meant to leave the process.
   */
  captureError(error: unknown, context: ErrorContext = {}): ErrorInfo {
    const normalized = error instanceof Error ? error : new Error(String(error));

    const errorInfo: ErrorInfo = {
      id: this.generateErrorId(),
      timestamp: new Date().toISOString(),
      type: normalized.name || normalized.constructor.name,
      message: normalized.message,
      stack: normalized.stack,
      context: { ...context },
      severity: this.determineSeverity(normalized)
    };

    this.storeError(errorInfo);
    this.logError(errorInfo);

    return errorInfo;
  }

  private determineSeverity(error: Error): ErrorInfo['severity'] {
    if (error instanceof RouterServiceError) {
      switch (error.code) {
        case 'client_input':
          return 'low';
        case 'backend':
          return 'high';
        case 'batch':
          return 'critical';
        case 'internal':
          return 'high';
      }
    }

    if (error.message.includes('timeout') || error.message.includes('Throttling')) {
      return 'high';
    }

    return 'medium';
  }

  private storeError(errorInfo: ErrorInfo): void {
    this.errors.set(errorInfo.id, errorInfo);

    // Map iteration order is insertion order, so the first key is the oldest
    while (this.errors.size > this.options.maxStoredErrors) {
      const oldest = this.errors.keys().next();
      if (oldest.done) break;
      this.errors.delete(oldest.value);
    }
  }

  private logError(errorInfo: ErrorInfo): void {
    const logLevel = errorInfo.severity === 'critical' || errorInfo.severity === 'high' ? 'error' : 'warn';
    console[logLevel](`Error [${errorInfo.id}]: ${errorInfo.type}: ${errorInfo.message}`, {
      severity: errorInfo.severity,
      context: errorInfo.context,
      timestamp: errorInfo.timestamp
    });
  }

  /**
   * Time-ordered correlation id, e.g. err-1718000000000-3f2a9c1d
   */
  private generateErrorId(): string {
    return `err-${Date.now()}-${uuidv4().replace(/-/g, '').slice(0, 8)}`;
  }

  getErrorStats(): ErrorStats {
    const stats: ErrorStats = {
      total: this.errors.size,
      bySeverity: {},
      byType: {}
    };

    for (const error of this.errors.values()) {
      stats.bySeverity[error.severity] = (stats.bySeverity[error.severity] || 0) + 1;
      stats.byType[error.type] = (stats.byType[error.type] || 0) + 1;
    }

    return stats;
  }

  getError(errorId: string): ErrorInfo | null {
    return this.errors.get(errorId) || null;
  }

  getAllErrors(): ErrorInfo[] {
    return Array.from(this.errors.values());
  }

  /**
   * Drop errors older than the given age
   */
  clearOldErrors(maxAgeMs: number = 24 * 60 * 60 * 1000): number {
    const cutoff = Date.now() - maxAgeMs;
    let cleared = 0;

    for (const [id, error] of this.errors.entries()) {
      if (new Date(error.timestamp).getTime() < cutoff) {
        this.errors.delete(id);
        cleared++;
      }
    }

    return cleared;
  }
}
