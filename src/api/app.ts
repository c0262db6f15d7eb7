/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as accessLogger } from 'hono/logger';
import { nanoid } from 'nanoid';

import { createLogger } from '@/lib/logger.js';
import type { SerialQueue } from '@/lib/serial-queue.js';
import type { Orchestrator } from '@/orchestrator/index.js';
import type { EnvironmentService } from '@/services/index.js';
import type { DomainKnowledgeProvider, ExecutionSandbox } from '@/types/index.js';

import { createAnalysisRoutes } from './routes/analysis.js';
import { createArtifactRoutes } from './routes/artifacts.js';
import { createDomainRoutes } from './routes/domains.js';
import { createHealthRoutes } from './routes/health.js';

const log = createLogger('http');

/**
 * App configuration
 */
export interface AppDeps {
  orchestrator: Orchestrator;
  sandbox: ExecutionSandbox;
  domains: DomainKnowledgeProvider;
  environment: EnvironmentService;
  queue: SerialQueue;
  allowedOrigins?: string[];
}

/**
 * Create the main Hono application
 */
export function createApp(deps: AppDeps): Hono {
  const { orchestrator, sandbox, domains, environment, queue, allowedOrigins } =
    deps;
  const app = new Hono();

  // Global middleware
  app.use('*', accessLogger((message) => log.info(message)));
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );
  app.use('*', async (c, next) => {
    const requestId = c.req.header('x-request-id') ?? `req-${nanoid(12)}`;
    c.set('requestId', requestId);
    c.header('X-Request-Id', requestId);
    await next();
  });

  app.route('/api/v1', createHealthRoutes({ environment }));
  app.route('/api/v1', createDomainRoutes({ domains }));
  app.route('/api/v1', createAnalysisRoutes({ orchestrator, queue }));
  app.route('/api/v1', createArtifactRoutes({ sandbox, queue }));

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: c.get('requestId') || 'unknown',
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    log.error('Unhandled error', { error: err.message, stack: err.stack });

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId: c.get('requestId') || 'unknown',
        },
      },
      500
    );
  });

  return app;
}
