import { ClientStatus, ServiceClients } from '../core/service-clients.js';
import { BatchOrchestrator } from '../services/batch-orchestrator.js';
import { ErrorHandler } from './error-handler.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthMetrics {
  status: HealthStatus;
  timestamp: string;
  uptime: number;
  memory: {
    used: number;
    total: number;
    percentage: number;
  };
  clients: ClientStatus;
  batches: {
    total: number;
    items: number;
    cacheHitRate: number;
    averageItemTime: number;
    errorRate: number;
  };
  issues: string[];
  recentErrors: string[];
}

export interface HealthThresholds {
  memory: number; // heap fraction
  itemTime: number; // milliseconds
  errorRate: number; // server errors per item
}

export interface HealthMonitorDependencies {
  orchestrator: Pick<BatchOrchestrator, 'getMetrics'>;
  clients: Pick<ServiceClients, 'getStatus'>;
  errorHandler: Pick<ErrorHandler, 'getAllErrors'>;
  memoryUsage?: () => NodeJS.MemoryUsage;
  now?: () => number;
}

const RECENT_ERROR_COUNT = 10;

export class HealthMonitor {
  private readonly startTime: number;
  private readonly thresholds: HealthThresholds;
  private readonly memoryUsage: () => NodeJS.MemoryUsage;
  private readonly now: () => number;

  constructor(private readonly deps: HealthMonitorDependencies, thresholds: Partial<HealthThresholds> = {}) {
    this.memoryUsage = deps.memoryUsage ?? (() => process.memoryUsage());
    this.now = deps.now ?? Date.now;
    this.startTime = this.now();
    this.thresholds = {
      memory: 0.9,
      itemTime: 15000,
      errorRate: 0.05,
      ...thresholds
    };
  }

  /**
   * Get comprehensive health metrics
   */
  getHealthMetrics(): HealthMetrics {
    const memoryUsage = this.memoryUsage();
    const batchMetrics = this.deps.orchestrator.getMetrics();
    const clients = this.deps.clients.getStatus();

    const items = batchMetrics.itemCount;
    const errorRate = items > 0 ? batchMetrics.serverErrorCount / items : 0;
    const lookups = batchMetrics.cacheHits + batchMetrics.cacheMisses;
    const memoryPercentage = memoryUsage.heapTotal > 0 ? memoryUsage.heapUsed / memoryUsage.heapTotal : 0;

    const issues: string[] = [];
    if (!clients.backendReady) {
      issues.push('Inference backend not initialized');
    }
    if (memoryPercentage > this.thresholds.memory) {
      issues.push(`High memory usage: ${(memoryPercentage * 100).toFixed(1)}%`);
    }
    if (batchMetrics.averageItemTime > this.thresholds.itemTime) {
      issues.push(`High item latency: ${Math.round(batchMetrics.averageItemTime)}ms`);
    }
    if (errorRate > this.thresholds.errorRate) {
      issues.push(`High error rate: ${(errorRate * 100).toFixed(1)}%`);
    }

    return {
      status: this.determineHealthStatus(clients, issues),
      timestamp: new Date(this.now()).toISOString(),
      uptime: this.now() - this.startTime,
      memory: {
        used: memoryUsage.heapUsed,
        total: memoryUsage.heapTotal,
        percentage: memoryPercentage
      },
      clients,
      batches: {
        total: batchMetrics.batchCount,
        items,
        cacheHitRate: lookups > 0 ? batchMetrics.cacheHits / lookups : 0,
        averageItemTime: batchMetrics.averageItemTime,
        errorRate
      },
      issues,
      recentErrors: this.getRecentErrors()
    };
  }

  /**
   * Without a backend nothing can be answered, whatever else looks fine.
   */
  private determineHealthStatus(clients: ClientStatus, issues: string[]): HealthStatus {
    if (!clients.backendReady) {
      return 'unhealthy';
    }
    if (issues.length === 0) {
      return 'healthy';
    }
    return issues.length <= 2 ? 'degraded' : 'unhealthy';
  }

  /**
   * Newest first, ids and types only; messages stay in the error log.
   */
  private getRecentErrors(): string[] {
    return this.deps.errorHandler
      .getAllErrors()
      .slice(-RECENT_ERROR_COUNT)
      .reverse()
      .map((error) => `${error.id} ${error.type} (${error.severity})`);
  }

  isReady(): boolean {
    return this.getHealthMetrics().status !== 'unhealthy';
  }
}
