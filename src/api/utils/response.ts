/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';

import type { Failure } from '@/types/index.js';

import { getErrorStatus } from '../types.js';

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: Failure['error'],
  requestId: string
): Response {
  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
        requestId,
      },
    },
    getErrorStatus(error.code)
  );
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  return c.json(
    {
      data,
      meta: { requestId },
    },
    status
  );
}
