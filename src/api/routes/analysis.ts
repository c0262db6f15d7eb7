/**
 * Analysis Routes
 * Runs a user message through the pipeline, as one response or as SSE
 *
 * All runs share one sandbox output directory, so they go through a
 * serial queue.
 */

import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { nanoid } from 'nanoid';
import { z } from 'zod';

import { createLogger } from '@/lib/logger.js';
import type { SerialQueue } from '@/lib/serial-queue.js';
import type { Orchestrator } from '@/orchestrator/index.js';
import type { PipelineRequest } from '@/types/index.js';

import { getRequestId, parseJsonBody } from '../utils/request.js';
import { errorResponse, successResponse } from '../utils/response.js';

const log = createLogger('api.analysis');

/**
 * Message max length
 */
const MAX_MESSAGE_LENGTH = 32000;
const MAX_HISTORY_TURNS = 500;

const turnSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
  domain: z.string().optional(),
});

export const analysisRequestSchema = z.object({
  message: z.string().trim().min(1).max(MAX_MESSAGE_LENGTH),
  domain: z.string().min(1),
  sessionId: z.string().min(1).max(128).optional(),
  history: z.array(turnSchema).max(MAX_HISTORY_TURNS).default([]),
});

export interface AnalysisRoutesDeps {
  orchestrator: Orchestrator;
  queue: SerialQueue;
}

export function createAnalysisRoutes(deps: AnalysisRoutesDeps): Hono {
  const { orchestrator, queue } = deps;
  const app = new Hono();

  function toPipelineRequest(
    body: z.output<typeof analysisRequestSchema>
  ): PipelineRequest {
    return {
      message: body.message,
      domain: body.domain,
      sessionId: body.sessionId ?? `session-${nanoid(12)}`,
      history: Object.freeze(body.history.map((turn) => Object.freeze(turn))),
    };
  }

  /**
   * POST /analysis
   * Answers with the full PipelineResult once the run has finished
   */
  app.post('/analysis', async (c) => {
    const requestId = getRequestId(c);
    const parsed = await parseJsonBody(c, analysisRequestSchema);
    if (!parsed.success) {
      return errorResponse(c, parsed.error, requestId);
    }

    const request = toPipelineRequest(parsed.data);
    const result = await queue(() => orchestrator.process(request));

    if (result.error?.code === 'DOMAIN_NOT_FOUND') {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result, requestId);
  });

  /**
   * POST /analysis/stream
   * Stage events as SSE, ending with the `result` event
   */
  app.post('/analysis/stream', async (c) => {
    const requestId = getRequestId(c);
    const parsed = await parseJsonBody(c, analysisRequestSchema);
    if (!parsed.success) {
      return errorResponse(c, parsed.error, requestId);
    }

    const request = toPipelineRequest(parsed.data);
    return streamSSE(c, async (stream) => {
      await queue(async () => {
        try {
          for await (const event of orchestrator.stream(request)) {
            await stream.writeSSE({
              data: JSON.stringify(event),
              event: event.type,
            });
          }
        } catch (error) {
          log.error('Analysis stream failed', {
            requestId,
            error: error instanceof Error ? error.message : String(error),
          });
          await stream.writeSSE({
            data: JSON.stringify({
              type: 'error',
              code: 'INTERNAL_ERROR',
              message: 'Streaming failed',
              timestamp: Date.now(),
            }),
            event: 'error',
          });
        }
      });
    });
  });

  return app;
}
