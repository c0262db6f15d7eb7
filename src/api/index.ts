/**
 * API Layer Exports
 *
 * API layer is thin - delegates to the orchestrator and services.
 */

export { createApp } from './app.js';
export type { AppDeps } from './app.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
export type { SuccessResponse, ErrorResponse } from './types.js';
