/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ContentfulStatusCode } from 'hono/utils/http-status';

import type { ErrorCode } from '@/types/index.js';

/**
 * Request-scoped values set by middleware
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, ContentfulStatusCode> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  DOMAIN_NOT_FOUND: 404,
  CONFIG_INVALID: 500,
  CLASSIFICATION_AMBIGUOUS: 500,
  STAGE_COMPLETION_FAILURE: 502,
  CODE_GENERATION_EMPTY: 502,
  REPORTING_DEGRADED: 502,
  SANDBOX_TIMEOUT: 504,
  SANDBOX_NONZERO_EXIT: 500,
  SANDBOX_LAUNCH_FAILURE: 500,
  TEMPLATE_SLOT_MISSING: 500,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ErrorCode): ContentfulStatusCode {
  return ERROR_STATUS_MAP[code];
}
