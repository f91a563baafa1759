import fs from 'node:fs';
import path from 'node:path';
import type { Server } from 'node:http';
import { loadConfig } from './config.js';
import { Database } from './services/database.js';
import { createNotifier } from './services/notifier.js';
import { createPriceSource } from './services/price-source.js';
import { closeServer, startStatusServer } from './services/status-server.js';
import { createHealthCell } from './monitors/health-cell.js';
import { PollScheduler } from './monitors/scheduler.js';
import { createLogger, setLogLevel } from './utils/logger.js';

const logger = createLogger('Main');

export interface StartOptions {
  withStatusServer: boolean;
}

export async function startMonitor(options: StartOptions): Promise<void> {
  logger.info(`Starting price monitor${options.withStatusServer ? ' with status server' : ''}...`);

  const config = loadConfig();
  setLogLevel(config.logLevel);
  logger.info(`Configuration loaded (${config.items.length} tracked items, source: ${config.source.kind})`);

  if (config.dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(config.dbPath), { recursive: true });
  }

  const db = new Database(config.dbPath);
  const restored = db.loadAll();
  logger.info(`Database initialized at ${config.dbPath} (${restored.length} stored states)`);

  const health = createHealthCell(
    config.items,
    new Date().toISOString(),
    config.monitoring.degradedAfterFailures,
    restored
  );
  const notifier = createNotifier(config.notifier);

  const scheduler = new PollScheduler({
    items: config.items,
    source: createPriceSource(config.source),
    store: db,
    notifier,
    health,
    policy: config.monitoring.policy,
    pollIntervalMs: config.monitoring.pollIntervalMs,
    fetchTimeoutMs: config.source.fetchTimeoutMs,
    notifyTimeoutMs: config.notifier.timeoutMs,
    degradedAfterFailures: config.monitoring.degradedAfterFailures,
  });

  let server: Server | null = null;
  if (options.withStatusServer) {
    server = await startStatusServer(health, config.port);
  }

  scheduler.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down...`);

    await scheduler.stop();
    if (server) {
      await closeServer(server);
    }
    notifier.close?.();
    db.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(error => {
        logger.error('Error during shutdown:', error);
        process.exit(1);
      });
    });
  }
}
