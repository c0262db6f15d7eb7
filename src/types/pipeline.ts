/**
 * Pipeline Domain Types
 *
 * SCOPE: request, per-stage results, orchestrator config, final result and
 * the events emitted while a request moves through the stages.
 */

import type { ConversationHistory } from './conversation.js';
import type { ErrorCode, WarningCode } from './errors.js';
import type { ArtifactDescriptor, SandboxRun } from './sandbox.js';

// ─────────────────────────────────────────────────────────────
// REQUEST
// ─────────────────────────────────────────────────────────────

export interface PipelineRequest {
  readonly message: string;
  readonly sessionId: string;
  readonly domain: string;
  readonly history: ConversationHistory;
}

// ─────────────────────────────────────────────────────────────
// STAGES
// ─────────────────────────────────────────────────────────────

export type StageName =
  | 'classify'
  | 'greeting'
  | 'rephrase'
  | 'plan'
  | 'codegen'
  | 'execute'
  | 'report';

/**
 * Pipeline state machine, per request
 */
export type PipelineState =
  | 'classifying'
  | 'greeting-reply'
  | 'rephrasing'
  | 'planning'
  | 'code-generating'
  | 'executing'
  | 'reporting'
  | 'errored';

export type MessageType = 'greeting' | 'analysis';

export interface StageResult {
  readonly stage: StageName;

  /** Label, rephrased question, plan, code, combined output or answer */
  readonly output: string;

  readonly durationMs: number;
}

/**
 * Model-call settings for one stage
 */
export interface StageSettings {
  maxTokens: number;
  temperature: number;

  /** How many trailing turns of history the stage sees (0 = none) */
  historyTurns: number;

  /** Characters kept from each history turn */
  historyCharLimit: number;

  /** Token budget for the history block */
  historyTokenBudget: number;
}

export type ModelStage = Exclude<StageName, 'execute'>;

// ─────────────────────────────────────────────────────────────
// ORCHESTRATOR CONFIG
// ─────────────────────────────────────────────────────────────

export interface OrchestratorConfig {
  /** Model identifier (e.g. 'gpt-4o') */
  model: string;

  stages: Record<ModelStage, StageSettings>;
}

const NO_HISTORY = {
  historyTurns: 0,
  historyCharLimit: 0,
  historyTokenBudget: 0,
} as const;

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  model: 'gpt-4o',
  stages: {
    classify: { maxTokens: 10, temperature: 0, ...NO_HISTORY },
    greeting: { maxTokens: 100, temperature: 0.7, ...NO_HISTORY },
    rephrase: {
      maxTokens: 200,
      temperature: 0,
      historyTurns: 6,
      historyCharLimit: 200,
      historyTokenBudget: 2000,
    },
    plan: {
      maxTokens: 1500,
      temperature: 0,
      historyTurns: 4,
      historyCharLimit: 200,
      historyTokenBudget: 2000,
    },
    codegen: { maxTokens: 4000, temperature: 0, ...NO_HISTORY },
    report: { maxTokens: 1200, temperature: 0.3, ...NO_HISTORY },
  },
};

// ─────────────────────────────────────────────────────────────
// RESULT
// ─────────────────────────────────────────────────────────────

export interface PipelineResult {
  success: boolean;
  messageType: MessageType;

  /** Always populated, even when the request failed */
  finalAnswer: string;

  sessionId: string;
  domain: string;

  rephrasedQuestion?: string;
  analysisPlan?: string;

  /** Loader snippet + generated analysis code, as executed */
  generatedCode?: string;

  execution?: SandboxRun;
  executionArtifacts?: ArtifactDescriptor[];

  error?: {
    code: ErrorCode;
    stage?: StageName;
    message: string;
  };

  warnings: WarningCode[];
  stages: StageResult[];
}

// ─────────────────────────────────────────────────────────────
// EVENTS
// ─────────────────────────────────────────────────────────────

interface BasePipelineEvent {
  type: string;
  timestamp: number;
}

export interface StageStartEvent extends BasePipelineEvent {
  type: 'stage.start';
  stage: StageName;
}

export interface StageCompleteEvent extends BasePipelineEvent {
  type: 'stage.complete';
  result: StageResult;
}

export interface StageErrorEvent extends BasePipelineEvent {
  type: 'stage.error';
  stage: StageName;
  code: ErrorCode;
  message: string;
}

export interface PipelineResultEvent extends BasePipelineEvent {
  type: 'result';
  result: PipelineResult;
}

export type PipelineEvent =
  | StageStartEvent
  | StageCompleteEvent
  | StageErrorEvent
  | PipelineResultEvent;
