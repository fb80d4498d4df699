import dotenv from 'dotenv';
import { createApp } from './src/api/app.js';
import { loadServiceConfig } from './src/config/environment.js';
import { createRouterRuntime } from './src/core/router-runtime.js';
import { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { HealthMonitor } from './src/monitoring/health-monitor.js';

dotenv.config();

const config = loadServiceConfig(process.env);
const runtime = createRouterRuntime(config);
const healthMonitor = new HealthMonitor(runtime);
const gracefulShutdown = new GracefulShutdown(healthMonitor, {
  timeout: config.shutdownTimeoutMs,
  forceExit: process.env['FORCE_EXIT_ON_SHUTDOWN'] !== 'false'
});

const app = createApp(config.urlPrefix, { runtime, healthMonitor });

function startService(): void {
  console.log('🚀 Starting Inference Router Service...');
  console.log(`Environment: ${config.nodeEnv}`);
  console.log(`Port: ${config.port}`);
  console.log(`URL Prefix: ${config.urlPrefix}`);
  console.log(`Region: ${config.region}`);

  console.log('📊 Initializing service clients...');
  if (!runtime.clients.initialize()) {
    console.error('❌ Inference backend unavailable, batches will fail until it initializes');
  }

  const server = app.listen(config.port, () => {
    console.log('🌐 Inference Router running on port', config.port);
    console.log(`📡 API endpoints available at: http://localhost:${config.port}${config.urlPrefix}`);
    console.log(`🔍 Health check available at: http://localhost:${config.port}${config.urlPrefix}/health`);
    console.log(`🚨 Error stats available at: http://localhost:${config.port}/errors`);

    const initialHealth = healthMonitor.getHealthMetrics();
    console.log(`💚 Initial health status: ${initialHealth.status}`);
  });

  // Registered first so no new batches arrive while clients close
  gracefulShutdown.addCleanupTask(async () => {
    console.log('🛑 Closing HTTP server...');
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        console.log('✅ HTTP server closed');
        resolve();
      });
    });
  });

  gracefulShutdown.addCleanupTask(async () => {
    console.log('🧹 Closing service clients...');
    await runtime.clients.shutdown();
  });

  gracefulShutdown.addCleanupTask(async () => {
    const cleared = runtime.errorHandler.clearOldErrors();
    console.log(`🧹 Cleared ${cleared} old error records`);
  });

  console.log('🎉 Inference Router Service started successfully!');
}

try {
  startService();
} catch (error) {
  console.error('💥 Failed to start service:', error);
  process.exit(1);
}

export { app, runtime, healthMonitor };
