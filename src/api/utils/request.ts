/**
 * Request helpers shared by routes
 */

import type { Context } from 'hono';
import type { z } from 'zod';

import type { Result } from '@/types/index.js';
import { failure, success } from '@/types/index.js';

/**
 * Request ID set by the app middleware
 */
export function getRequestId(c: Context): string {
  return c.get('requestId') || 'unknown';
}

/**
 * Read and validate a JSON body
 */
export async function parseJsonBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S
): Promise<Result<z.output<S>>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return failure('VALIDATION_ERROR', 'Request body must be valid JSON');
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return failure('VALIDATION_ERROR', 'Invalid request body', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return success(parsed.data);
}
