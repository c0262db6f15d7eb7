/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure } from './result.js';
export {
  success,
  failure,
  isSuccess,
  isFailure,
} from './result.js';
export type { ErrorCode, WarningCode } from './errors.js';
export { ERROR_CODES, PipelineError } from './errors.js';
export type {
  ConversationTurn,
  ConversationHistory,
  TurnRole,
  Tokenizer,
} from './conversation.js';
export type { LLMClient, LLMMessage, LLMRequest, LLMResponse } from './llm.js';
export type {
  ArtifactDescriptor,
  ExecutionSandbox,
  HarnessContext,
  SandboxConfig,
  SandboxRun,
  SandboxRunStatus,
  SandboxRuntime,
  SandboxState,
} from './sandbox.js';
export {
  DEFAULT_ARTIFACT_EXTENSIONS,
  DEFAULT_MAX_OUTPUT_BYTES,
  DEFAULT_SANDBOX_TIMEOUT_MS,
} from './sandbox.js';
export type {
  DomainKnowledge,
  DomainKnowledgeProvider,
  DomainSchema,
  DomainTable,
} from './domain.js';
export type {
  MessageType,
  ModelStage,
  OrchestratorConfig,
  PipelineEvent,
  PipelineRequest,
  PipelineResult,
  PipelineResultEvent,
  PipelineState,
  StageCompleteEvent,
  StageErrorEvent,
  StageName,
  StageResult,
  StageSettings,
  StageStartEvent,
} from './pipeline.js';
export { DEFAULT_ORCHESTRATOR_CONFIG } from './pipeline.js';
