/**
 * Drama Collector — Server
 *
 * Starts the HTTP API and the collection scheduler.
 *
 * Usage:
 *   npm run serve
 */

import 'dotenv/config';
import { logger } from '../src/lib/logger';
import { errorMessage } from '../src/lib/errors';
import { ConfigManager } from '../src/config';
import { createRuntime } from '../src/runtime';
import { createApp } from '../src/server/api';

export function startServer(): void {
  const configManager = new ConfigManager();
  const config = configManager.get();
  const runtime = createRuntime(config);

  const app = createApp({
    orchestrator: runtime.orchestrator,
    store: runtime.store,
    config: configManager,
    scheduler: runtime.scheduler,
    clock: runtime.clock,
  });

  const server = app.listen(config.server.port, () => {
    logger.info(`API server listening on port ${config.server.port}`);
    console.log(`${config.appName} started on http://localhost:${config.server.port}`);
    console.log('Endpoints:');
    console.log(`  GET  /health         - Health check`);
    console.log(`  GET  /status         - Orchestrator and scheduler status`);
    console.log(`  POST /jobs/start     - Start a collection job`);
    console.log(`  POST /jobs/stop      - Cancel running jobs`);
    console.log(`  GET  /jobs/history   - Recent jobs`);
    console.log(`  GET  /records        - Stored records`);
  });

  if (config.scheduler.enabled) {
    runtime.scheduler.start();
  }

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });

    runtime.scheduler.stop();
    const stopped = runtime.orchestrator.stop();

    Promise.all(stopped.map(id => runtime.orchestrator.whenSettled(id)))
      .then(() => runtime.scheduler.drain())
      .then(() => {
        server.close(() => process.exit(0));
      })
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

// Start if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  startServer();
}
