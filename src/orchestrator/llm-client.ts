/**
 * LLM Client Implementation
 *
 * Wraps the OpenAI SDK behind the LLMClient contract: one chat completion
 * request in, one text out. Works against any OpenAI-compatible endpoint
 * through `baseURL`. Retries are the SDK's own policy (`maxRetries`).
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';

import type {
  LLMClient,
  LLMMessage,
  LLMRequest,
  LLMResponse,
} from '@/types/index.js';

/**
 * LLM Client configuration options
 */
export interface LLMClientConfig {
  /** API key (required) */
  apiKey: string;

  /** Base URL override (default: OpenAI) */
  baseURL?: string;

  /** Request timeout in milliseconds */
  timeout?: number;

  /** SDK-level retries on transient errors */
  maxRetries?: number;
}

/**
 * Convert our LLMMessage to OpenAI's ChatCompletionMessageParam
 */
function toOpenAIMessage(msg: LLMMessage): ChatCompletionMessageParam {
  switch (msg.role) {
    case 'system':
      return { role: 'system', content: msg.content };
    case 'user':
      return { role: 'user', content: msg.content };
    case 'assistant':
      return { role: 'assistant', content: msg.content };
  }
}

function toFinishReason(
  reason: ChatCompletion.Choice['finish_reason'] | undefined
): LLMResponse['finish_reason'] {
  switch (reason) {
    case 'stop':
    case 'length':
    case 'content_filter':
      return reason;
    default:
      return 'other';
  }
}

/**
 * Create an LLM client
 */
export function createLLMClient(config: LLMClientConfig): LLMClient {
  // Validate API key
  if (!config.apiKey || config.apiKey.trim() === '') {
    throw new Error('API key is required');
  }

  const openai = new OpenAI({
    apiKey: config.apiKey,
    ...(config.baseURL ? { baseURL: config.baseURL } : {}),
    timeout: config.timeout ?? 120000,
    ...(config.maxRetries !== undefined && { maxRetries: config.maxRetries }),
  });

  return {
    /**
     * Send a non-streaming chat completion request
     */
    async complete(request: LLMRequest): Promise<LLMResponse> {
      const response = await openai.chat.completions.create({
        model: request.model,
        messages: request.messages.map(toOpenAIMessage),
        max_tokens: request.max_tokens,
        temperature: request.temperature,
        stream: false,
      });

      const choice = response.choices.at(0);

      return {
        id: response.id,
        model: response.model,
        content: choice?.message.content ?? '',
        finish_reason: toFinishReason(choice?.finish_reason),
        usage: {
          prompt_tokens: response.usage?.prompt_tokens ?? 0,
          completion_tokens: response.usage?.completion_tokens ?? 0,
          total_tokens: response.usage?.total_tokens ?? 0,
        },
      };
    },
  };
}
