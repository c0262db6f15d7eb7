/**
 * Error taxonomy shared by the pipeline, the sandbox and the HTTP layer
 */

export const ERROR_CODES = [
  'CLASSIFICATION_AMBIGUOUS',
  'STAGE_COMPLETION_FAILURE',
  'CODE_GENERATION_EMPTY',
  'SANDBOX_TIMEOUT',
  'SANDBOX_NONZERO_EXIT',
  'SANDBOX_LAUNCH_FAILURE',
  'REPORTING_DEGRADED',
  'DOMAIN_NOT_FOUND',
  'TEMPLATE_SLOT_MISSING',
  'VALIDATION_ERROR',
  'CONFIG_INVALID',
  'NOT_FOUND',
  'INTERNAL_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

/**
 * Codes that describe a recovered condition rather than a failed request
 */
export type WarningCode = Extract<
  ErrorCode,
  'CLASSIFICATION_AMBIGUOUS' | 'REPORTING_DEGRADED'
>;

/**
 * Error thrown inside the orchestrator and converted to a Result at the
 * stage boundary
 */
export class PipelineError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}
