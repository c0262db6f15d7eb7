/**
 * Application Entry Point
 *
 * Loads configuration, wires the pipeline and starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/index.js';
import { createContainer } from './app/container.js';
import { loadConfig } from './config/index.js';
import { logger, setLogLevel } from './lib/index.js';

const configResult = loadConfig(process.env);
if (!configResult.success) {
  logger.error('Invalid configuration', configResult.error.details);
  process.exit(1);
}
const config = configResult.data;
setLogLevel(config.logLevel);

const container = createContainer(config);

const report = await container.environment.checkEnvironment();
for (const check of report.checks) {
  if (check.ok) {
    logger.info(`${check.name}: ${check.detail}`);
  } else {
    logger.warn(`${check.name}: ${check.detail}`);
  }
}

const app = createApp({
  orchestrator: container.orchestrator,
  sandbox: container.sandbox,
  domains: container.domains,
  environment: container.environment,
  queue: container.queue,
  allowedOrigins: config.allowedOrigins,
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info(`Server listening on http://localhost:${info.port}`, {
    runtime: container.runtime.name,
    model: config.openai.model,
  });
});

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down`);
  server.close();
  await container.sandbox.teardown();
  process.exit(0);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
