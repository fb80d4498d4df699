import { HealthMonitor } from './health-monitor.js';

export interface ShutdownOptions {
  timeout: number; // milliseconds
  forceExit: boolean;
  handleSignals: boolean;
  cleanupTasks: Array<() => Promise<void>>;
  exit: (code: number) => void;
}

export class GracefulShutdown {
  private isShuttingDown: boolean = false;
  private shutdownTimeout: NodeJS.Timeout | null = null;
  private options: ShutdownOptions;

  constructor(
    private readonly healthMonitor: HealthMonitor,
    options: Partial<ShutdownOptions> = {}
  ) {
    this.options = {
      timeout: 30000,
      forceExit: true,
      handleSignals: true,
      exit: (code) => process.exit(code),
      ...options,
      cleanupTasks: [...(options.cleanupTasks ?? [])]
    };

    if (this.options.handleSignals) {
      this.setupSignalHandlers();
    }
  }

  private setupSignalHandlers(): void {
    // Docker, Kubernetes
    process.on('SIGTERM', () => {
      console.log('Received SIGTERM signal');
      void this.shutdown('SIGTERM');
    });

    // Ctrl+C
    process.on('SIGINT', () => {
      console.log('Received SIGINT signal');
      void this.shutdown('SIGINT');
    });

    process.on('uncaughtException', (error) => {
      console.error('Uncaught Exception:', error);
      void this.shutdown('uncaughtException', error);
    });

    process.on('unhandledRejection', (reason) => {
      console.error('Unhandled Rejection:', reason);
      void this.shutdown('unhandledRejection', reason);
    });
  }

  /**
   * Cleanup tasks run in registration order: register the HTTP server
   * first so no new batches arrive while clients are closing.
   */
  addCleanupTask(task: () => Promise<void>): void {
    this.options.cleanupTasks.push(task);
  }

  async shutdown(signal: string, error?: unknown): Promise<void> {
    if (this.isShuttingDown) {
      console.log('Shutdown already in progress, ignoring signal:', signal);
      return;
    }

    this.isShuttingDown = true;
    console.log(`🛑 Initiating graceful shutdown due to: ${signal}`);

    this.shutdownTimeout = setTimeout(() => {
      console.error('Shutdown timeout reached, forcing exit');
      if (this.options.forceExit) {
        this.options.exit(1);
      }
    }, this.options.timeout);

    const failedTasks = await this.executeCleanupTasks();

    const finalHealth = this.healthMonitor.getHealthMetrics();
    console.log(
      `Final health status: ${finalHealth.status} (${finalHealth.batches.total} batches, ${finalHealth.batches.items} items)`
    );

    if (this.shutdownTimeout) {
      clearTimeout(this.shutdownTimeout);
      this.shutdownTimeout = null;
    }

    if (failedTasks === 0) {
      console.log('✅ Graceful shutdown completed successfully');
    } else {
      console.error(`Graceful shutdown finished with ${failedTasks} failed cleanup task(s)`);
    }
    this.options.exit(error !== undefined || failedTasks > 0 ? 1 : 0);
  }

  /**
   * A failing task is logged and counted; the rest still run.
   */
  private async executeCleanupTasks(): Promise<number> {
    const tasks = this.options.cleanupTasks;
    let failed = 0;

    for (let i = 0; i < tasks.length; i++) {
      try {
        console.log(`Executing cleanup task ${i + 1}/${tasks.length}`);
        await tasks[i]();
      } catch (error) {
        failed++;
        console.error(`Cleanup task ${i + 1} failed:`, error);
      }
    }

    return failed;
  }

  isShuttingDownInProgress(): boolean {
    return this.isShuttingDown;
  }
}
