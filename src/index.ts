#!/usr/bin/env node
// src/index.ts
import type { Server } from 'http';
import { DBConsole } from './console/DBConsole';
import { Engine } from './db/Engine';
import { loadConfig } from './config/env';
import { logger, setLogLevel } from './utils/logger';
import { startMetricsServer } from './monitoring/metrics-server';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  logger.info({
    version: '1.0.0',
    logLevel: config.logLevel,
    metricsPort: config.metricsPort,
    action: 'startup'
  }, 'Starting key/value session');

  const engine = new Engine();

  // The session runs without metrics when the port cannot be bound
  let metricsServer: Server | undefined;
  if (config.metricsPort !== undefined) {
    try {
      metricsServer = await startMetricsServer(config.metricsPort, engine);
    } catch (err) {
      logger.error({ err, port: config.metricsPort }, 'Metrics server not started');
    }
  }

  try {
    await new DBConsole(engine).listen(process.stdin, process.stdout);
  } finally {
    metricsServer?.close();
  }

  logger.info({ action: 'shutdown', uptime: process.uptime() }, 'Session closed');
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Session aborted');
  process.exitCode = 1;
});
