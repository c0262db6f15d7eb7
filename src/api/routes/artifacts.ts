/**
 * Artifact Routes
 * Serves chart files from the sandbox output directory
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { Hono } from 'hono';

import type { SerialQueue } from '@/lib/serial-queue.js';
import type { ExecutionSandbox } from '@/types/index.js';

import { getRequestId } from '../utils/request.js';
import { errorResponse, successResponse } from '../utils/response.js';

const CONTENT_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.svg': 'image/svg+xml',
  '.gif': 'image/gif',
};

/**
 * Plain file names only; no directories and no dot-files
 */
export function isArtifactName(name: string): boolean {
  return (
    /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/.test(name) &&
    path.extname(name).toLowerCase() in CONTENT_TYPES
  );
}

export interface ArtifactRoutesDeps {
  sandbox: ExecutionSandbox;
  queue: SerialQueue;
}

export function createArtifactRoutes(deps: ArtifactRoutesDeps): Hono {
  const { sandbox, queue } = deps;
  const app = new Hono();

  /**
   * GET /artifacts/:name
   */
  app.get('/artifacts/:name', async (c) => {
    const requestId = getRequestId(c);
    const name = c.req.param('name');

    const contentType = CONTENT_TYPES[path.extname(name).toLowerCase()];
    if (!isArtifactName(name) || contentType === undefined) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: `Invalid artifact name: ${name}` },
        requestId
      );
    }

    let content: Buffer;
    try {
      content = await readFile(path.join(sandbox.outputDirectory, name));
    } catch {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: `Artifact not found: ${name}` },
        requestId
      );
    }

    return c.body(new Uint8Array(content), 200, {
      'Content-Type': contentType,
      'Cache-Control': 'no-store',
    });
  });

  /**
   * DELETE /artifacts
   * Waits for any running analysis before clearing
   */
  app.delete('/artifacts', async (c) => {
    await queue(() => sandbox.clearArtifacts());
    return successResponse(c, { cleared: true }, getRequestId(c));
  });

  return app;
}
