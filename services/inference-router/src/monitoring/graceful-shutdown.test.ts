import { ErrorHandler } from './error-handler.js';
import { GracefulShutdown } from './graceful-shutdown.js';
import { HealthMonitor } from './health-monitor.js';

describe('GracefulShutdown', () => {
  let healthMonitor: HealthMonitor;
  let exit: jest.Mock<void, [number]>;

  beforeEach(() => {
    healthMonitor = new HealthMonitor({
      orchestrator: {
        getMetrics: () => ({
          batchCount: 0,
          itemCount: 0,
          cacheHits: 0,
          cacheMisses: 0,
          clientErrorCount: 0,
          serverErrorCount: 0,
          averageItemTime: 0
        })
      },
      clients: { getStatus: () => ({ backendReady: true, cacheStore: null, initializedAt: null }) },
      errorHandler: new ErrorHandler()
    });
    exit = jest.fn<void, [number]>();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should run cleanup tasks in order and exit cleanly', async () => {
    const calls: string[] = [];
    const shutdown = new GracefulShutdown(healthMonitor, { handleSignals: false, exit });
    shutdown.addCleanupTask(async () => {
      calls.push('server');
    });
    shutdown.addCleanupTask(async () => {
      calls.push('clients');
    });

    await shutdown.shutdown('SIGTERM');

    expect(calls).toEqual(['server', 'clients']);
    expect(exit).toHaveBeenCalledWith(0);
    expect(shutdown.isShuttingDownInProgress()).toBe(true);
  });

  it('should keep going past a failing task and exit with an error code', async () => {
    const later = jest.fn(async () => undefined);
    const shutdown = new GracefulShutdown(healthMonitor, {
      handleSignals: false,
      exit,
      cleanupTasks: [
        async () => {
          throw new Error('server already closed');
        },
        later
      ]
    });

    await shutdown.shutdown('SIGINT');

    expect(later).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should exit with an error code after a crash', async () => {
    const shutdown = new GracefulShutdown(healthMonitor, { handleSignals: false, exit });

    await shutdown.shutdown('uncaughtException', new Error('crash'));

    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should ignore a second signal while shutting down', async () => {
    const task = jest.fn(async () => undefined);
    const shutdown = new GracefulShutdown(healthMonitor, { handleSignals: false, exit, cleanupTasks: [task] });

    await Promise.all([shutdown.shutdown('SIGTERM'), shutdown.shutdown('SIGINT')]);

    expect(task).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });
});
