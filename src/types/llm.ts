/**
 * Completion Service Types
 *
 * The LLM provider is a black box: one request in, one text completion out.
 * SCOPE: request/response contract only, no tools and no streaming.
 */

import type { TurnRole } from './conversation.js';

// ─────────────────────────────────────────────────────────────
// REQUEST / RESPONSE
// ─────────────────────────────────────────────────────────────

export interface LLMMessage {
  role: TurnRole;
  content: string;
}

export interface LLMRequest {
  model: string;
  messages: LLMMessage[];
  max_tokens: number;
  temperature: number;
}

export interface LLMResponse {
  id: string;
  model: string;

  /** Text of the first choice, empty when the provider returned none */
  content: string;

  finish_reason: 'stop' | 'length' | 'content_filter' | 'other';

  usage: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

/**
 * Completion service client. Implementations throw on transport, auth or
 * quota errors; the orchestrator turns those into stage failures.
 */
export interface LLMClient {
  complete(request: LLMRequest): Promise<LLMResponse>;
}
