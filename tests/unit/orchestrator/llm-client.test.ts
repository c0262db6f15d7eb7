/**
 * LLM Client Unit Tests
 */

import OpenAI from 'openai';
import { describe, it, expect, vi, beforeEach } from 'vitest';

import { createLLMClient } from '@/orchestrator/llm-client.js';
import type { LLMRequest } from '@/types/index.js';

// Create mock create function
const mockCreate = vi.fn();

// Mock the OpenAI SDK
vi.mock('openai', () => {
  return {
    default: vi.fn(() => ({
      chat: {
        completions: {
          create: mockCreate,
        },
      },
    })),
  };
});

const request: LLMRequest = {
  model: 'gpt-4o',
  messages: [
    { role: 'system', content: 'Classify the message' },
    { role: 'user', content: 'Hi' },
  ],
  max_tokens: 10,
  temperature: 0,
};

function completion(overrides: Record<string, unknown> = {}) {
  return {
    id: 'chatcmpl-123',
    model: 'gpt-4o-2024-08-06',
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content: 'greeting' },
        finish_reason: 'stop',
      },
    ],
    usage: { prompt_tokens: 12, completion_tokens: 1, total_tokens: 13 },
    ...overrides,
  };
}

describe('LLM Client', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('createLLMClient', () => {
    it('should create a client with valid API key', () => {
      const client = createLLMClient({ apiKey: 'test-secret' });

      expect(typeof client.complete).toBe('function');
      expect(vi.mocked(OpenAI)).toHaveBeenCalledWith({
        apiKey: 'test-secret',
        timeout: 120000,
      });
    });

    it('should throw if API key is missing', () => {
      expect(() => createLLMClient({ apiKey: '' })).toThrow('API key is required');
      expect(() => createLLMClient({ apiKey: '   ' })).toThrow(
        'API key is required'
      );
    });

    it('should pass base URL and retry overrides to the SDK', () => {
      createLLMClient({
        apiKey: 'test-secret',
        baseURL: 'http://localhost:8080/v1',
        timeout: 5000,
        maxRetries: 0,
      });

      expect(vi.mocked(OpenAI)).toHaveBeenCalledWith({
        apiKey: 'test-secret',
        baseURL: 'http://localhost:8080/v1',
        timeout: 5000,
        maxRetries: 0,
      });
    });
  });

  describe('complete()', () => {
    it('should send a non-streaming chat completion request', async () => {
      mockCreate.mockResolvedValue(completion());

      await createLLMClient({ apiKey: 'test-secret' }).complete(request);

      expect(mockCreate).toHaveBeenCalledWith({
        model: 'gpt-4o',
        messages: [
          { role: 'system', content: 'Classify the message' },
          { role: 'user', content: 'Hi' },
        ],
        max_tokens: 10,
        temperature: 0,
        stream: false,
      });
    });

    it('should return the first choice and usage', async () => {
      mockCreate.mockResolvedValue(completion());

      const response = await createLLMClient({ apiKey: 'test-secret' }).complete(
        request
      );

      expect(response).toEqual({
        id: 'chatcmpl-123',
        model: 'gpt-4o-2024-08-06',
        content: 'greeting',
        finish_reason: 'stop',
        usage: { prompt_tokens: 12, completion_tokens: 1, total_tokens: 13 },
      });
    });

    it('should map missing content and unknown finish reasons', async () => {
      mockCreate.mockResolvedValue(
        completion({
          choices: [
            {
              index: 0,
              message: { role: 'assistant', content: null },
              finish_reason: 'tool_calls',
            },
          ],
          usage: undefined,
        })
      );

      const response = await createLLMClient({ apiKey: 'test-secret' }).complete(
        request
      );

      expect(response.content).toBe('');
      expect(response.finish_reason).toBe('other');
      expect(response.usage).toEqual({
        prompt_tokens: 0,
        completion_tokens: 0,
        total_tokens: 0,
      });
    });

    it('should cope with a response without choices', async () => {
      mockCreate.mockResolvedValue(completion({ choices: [] }));

      const response = await createLLMClient({ apiKey: 'test-secret' }).complete(
        request
      );

      expect(response.content).toBe('');
      expect(response.finish_reason).toBe('other');
    });

    it('should propagate API errors', async () => {
      mockCreate.mockRejectedValue(new Error('API rate limit exceeded'));

      await expect(
        createLLMClient({ apiKey: 'test-secret' }).complete(request)
      ).rejects.toThrow('API rate limit exceeded');
    });
  });
});
