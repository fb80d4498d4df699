import { ClientStatus } from '../core/service-clients.js';
import { BatchMetrics } from '../types/index.js';
import { ErrorHandler } from './error-handler.js';
import { BackendError } from './errors.js';
import { HealthMonitor } from './health-monitor.js';

const memory = (heapUsed: number, heapTotal: number): NodeJS.MemoryUsage => ({
  rss: heapTotal,
  heapTotal,
  heapUsed,
  external: 0,
  arrayBuffers: 0
});

describe('HealthMonitor', () => {
  let metrics: BatchMetrics;
  let status: ClientStatus;
  let heapUsed: number;
  let errorHandler: ErrorHandler;
  let clock: number;
  let monitor: HealthMonitor;

  beforeEach(() => {
    metrics = {
      batchCount: 2,
      itemCount: 20,
      cacheHits: 5,
      cacheMisses: 15,
      clientErrorCount: 3,
      serverErrorCount: 0,
      averageItemTime: 120
    };
    status = { backendReady: true, cacheStore: 'memory', initializedAt: '2024-01-01T00:00:00.000Z' };
    heapUsed = 50;
    errorHandler = new ErrorHandler();
    clock = 1_700_000_000_000;
    monitor = new HealthMonitor({
      orchestrator: { getMetrics: () => metrics },
      clients: { getStatus: () => status },
      errorHandler,
      memoryUsage: () => memory(heapUsed, 100),
      now: () => clock
    });
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should report a healthy service with its batch figures', () => {
    clock += 5000;

    expect(monitor.getHealthMetrics()).toEqual({
      status: 'healthy',
      timestamp: new Date(1_700_000_005_000).toISOString(),
      uptime: 5000,
      memory: { used: 50, total: 100, percentage: 0.5 },
      clients: status,
      batches: { total: 2, items: 20, cacheHitRate: 0.25, averageItemTime: 120, errorRate: 0 },
      issues: [],
      recentErrors: []
    });
    expect(monitor.isReady()).toBe(true);
  });

  it('should degrade on a high server error rate', () => {
    metrics.serverErrorCount = 2;

    const health = monitor.getHealthMetrics();

    expect(health.status).toBe('degraded');
    expect(health.issues).toEqual(['High error rate: 10.0%']);
  });

  it('should be unhealthy when three checks fail at once', () => {
    metrics.serverErrorCount = 5;
    metrics.averageItemTime = 20000;
    heapUsed = 95;

    const health = monitor.getHealthMetrics();

    expect(health.issues).toEqual([
      'High memory usage: 95.0%',
      'High item latency: 20000ms',
      'High error rate: 25.0%'
    ]);
    expect(health.status).toBe('unhealthy');
  });

  it('should be unhealthy and not ready without an inference backend', () => {
    status = { backendReady: false, cacheStore: null, initializedAt: null };

    expect(monitor.getHealthMetrics().status).toBe('unhealthy');
    expect(monitor.isReady()).toBe(false);
  });

  it('should list recent errors newest first without their messages', () => {
    const first = errorHandler.captureError(new BackendError('secret detail one'));
    const second = errorHandler.captureError(new BackendError('secret detail two'));

    expect(monitor.getHealthMetrics().recentErrors).toEqual([
      `${second.id} BackendError (high)`,
      `${first.id} BackendError (high)`
    ]);
  });
});
