/**
 * Health Routes
 * Liveness and environment diagnostics
 */

import { Hono } from 'hono';

import type { EnvironmentService } from '@/services/index.js';

import { getRequestId } from '../utils/request.js';

export interface HealthRoutesDeps {
  environment: EnvironmentService;
}

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: HealthRoutesDeps): Hono {
  const { environment } = deps;
  const app = new Hono();

  /**
   * GET /health
   * Liveness check
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: 'v1',
    });
  });

  /**
   * GET /health/environment
   * API key, interpreter and domain data checks; 503 when any fails
   */
  app.get('/health/environment', async (c) => {
    const report = await environment.checkEnvironment();
    return c.json(
      { data: report, meta: { requestId: getRequestId(c) } },
      report.ok ? 200 : 503
    );
  });

  return app;
}
