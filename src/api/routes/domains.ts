/**
 * Domain Routes
 * Lists the configured data domains and describes one
 */

import { Hono } from 'hono';

import type { DomainKnowledgeProvider } from '@/types/index.js';

import { getRequestId } from '../utils/request.js';
import { errorResponse, successResponse } from '../utils/response.js';

export interface DomainRoutesDeps {
  domains: DomainKnowledgeProvider;
}

export function createDomainRoutes(deps: DomainRoutesDeps): Hono {
  const { domains } = deps;
  const app = new Hono();

  /**
   * GET /domains
   */
  app.get('/domains', async (c) => {
    const names = await domains.listDomains();
    return successResponse(c, { domains: names }, getRequestId(c));
  });

  /**
   * GET /domains/:name
   * Schema summary; the loader snippet stays server-side
   */
  app.get('/domains/:name', async (c) => {
    const requestId = getRequestId(c);
    const result = await domains.getDomain(c.req.param('name'));

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const { name, displayName, description, tableNames, schemaDescription } =
      result.data;
    return successResponse(
      c,
      {
        name,
        displayName,
        description,
        tables: [...tableNames],
        schemaDescription,
      },
      requestId
    );
  });

  return app;
}
