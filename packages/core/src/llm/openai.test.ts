// Tests for the OpenAI chat provider
import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ContentFilterError,
  ContextLengthError,
  LLMAuthenticationError,
  LLMError,
  LLMPermissionError,
  LLMRateLimitError,
  LLMServerError,
  LLMValidationError,
  ModelNotFoundError,
} from './errors.js';
import { OpenAIProvider } from './openai.js';

const { mockCreate } = vi.hoisted(() => ({ mockCreate: vi.fn() }));

// Mock the OpenAI module
vi.mock('openai', () => {
  // Match actual OpenAI APIError signature:
  // constructor(status, error, message, headers)
  class MockAPIError extends Error {
    status: number;
    error: object | undefined;
    headers: Record<string, string> | undefined;
    constructor(
      status: number,
      error: object | undefined,
      message: string | undefined,
      headers: Record<string, string> | undefined,
    ) {
      super(message || 'Unknown error');
      this.name = 'APIError';
      this.status = status;
      this.error = error;
      this.headers = headers;
    }
  }

  return {
    default: vi.fn().mockImplementation(() => ({
      chat: {
        completions: {
          create: mockCreate,
        },
      },
    })),
    APIError: MockAPIError,
  };
});

const USER_TURN = [{ role: 'user' as const, content: 'How many people live in Texas?' }];

async function rejectWith(
  status: number,
  message: string,
  headers?: Record<string, string>,
): Promise<void> {
  const { APIError } = await import('openai');
  mockCreate.mockRejectedValueOnce(
    new APIError(status, undefined, message, headers),
  );
}

describe('OpenAIProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('constructor', () => {
    it('should throw LLMAuthenticationError if API key is missing', () => {
      expect(() => new OpenAIProvider('')).toThrow(LLMAuthenticationError);
      expect(() => new OpenAIProvider('')).toThrow(
        'OpenAI API key is required',
      );
    });

    it('should use the default model if not specified', () => {
      expect(new OpenAIProvider('test-openai-key').getModel()).toBe(
        'gpt-4o-mini',
      );
    });

    it('should accept a custom model', () => {
      expect(new OpenAIProvider('test-openai-key', 'gpt-4o').getModel()).toBe(
        'gpt-4o',
      );
    });
  });

  describe('chat', () => {
    it('should return the assistant text on success', async () => {
      mockCreate.mockResolvedValueOnce({
        choices: [{ message: { content: 'About 30 million.' } }],
      });

      const provider = new OpenAIProvider('test-openai-key');
      const result = await provider.chat({ messages: USER_TURN });

      expect(result).toEqual({ content: 'About 30 million.', toolCalls: [] });
    });

    it('should return function tool calls', async () => {
      mockCreate.mockResolvedValueOnce({
        choices: [
          {
            message: {
              content: null,
              tool_calls: [
                {
                  id: 'call_1',
                  type: 'function',
                  function: { name: 'get_dcid', arguments: '{"place":"Texas"}' },
                },
              ],
            },
          },
        ],
      });

      const provider = new OpenAIProvider('test-openai-key');
      const result = await provider.chat({ messages: USER_TURN });

      expect(result).toEqual({
        content: null,
        toolCalls: [
          { id: 'call_1', name: 'get_dcid', arguments: '{"place":"Texas"}' },
        ],
      });
    });

    it('should send tools with automatic tool choice', async () => {
      mockCreate.mockResolvedValueOnce({
        choices: [{ message: { content: 'ok' } }],
      });

      const provider = new OpenAIProvider('test-openai-key', 'gpt-4o');
      await provider.chat({
        messages: USER_TURN,
        tools: [
          {
            name: 'get_dcid',
            description: 'Look up a place DCID',
            parameters: { type: 'object', properties: {} },
          },
        ],
      });

      expect(mockCreate).toHaveBeenCalledWith({
        model: 'gpt-4o',
        messages: [{ role: 'user', content: 'How many people live in Texas?' }],
        tools: [
          {
            type: 'function',
            function: {
              name: 'get_dcid',
              description: 'Look up a place DCID',
              parameters: { type: 'object', properties: {} },
            },
          },
        ],
        tool_choice: 'auto',
      });
    });

    it('should translate assistant tool calls and tool results', async () => {
      mockCreate.mockResolvedValueOnce({
        choices: [{ message: { content: 'done' } }],
      });

      const provider = new OpenAIProvider('test-openai-key');
      await provider.chat({
        messages: [
          { role: 'system', content: 'Be brief.' },
          ...USER_TURN,
          {
            role: 'assistant',
            content: null,
            toolCalls: [
              { id: 'call_1', name: 'get_dcid', arguments: '{"place":"Texas"}' },
            ],
          },
          { role: 'tool', toolCallId: 'call_1', content: 'DCID for Texas: geoId/48' },
        ],
      });

      expect(mockCreate.mock.calls[0]?.[0].messages).toEqual([
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'How many people live in Texas?' },
        {
          role: 'assistant',
          content: null,
          tool_calls: [
            {
              id: 'call_1',
              type: 'function',
              function: { name: 'get_dcid', arguments: '{"place":"Texas"}' },
            },
          ],
        },
        {
          role: 'tool',
          tool_call_id: 'call_1',
          content: 'DCID for Texas: geoId/48',
        },
      ]);
    });

    it('should pass maxTokens and temperature when specified', async () => {
      mockCreate.mockResolvedValueOnce({
        choices: [{ message: { content: 'response' } }],
      });

      const provider = new OpenAIProvider('test-openai-key');
      await provider.chat({ messages: USER_TURN, maxTokens: 100, temperature: 0 });

      expect(mockCreate).toHaveBeenCalledWith(
        expect.objectContaining({ max_tokens: 100, temperature: 0 }),
      );
    });

    it('should throw LLMError when there are no choices', async () => {
      mockCreate.mockResolvedValueOnce({ choices: [] });

      const provider = new OpenAIProvider('test-openai-key');
      await expect(provider.chat({ messages: USER_TURN })).rejects.toThrow(
        'No choices in response',
      );
    });

    it('should throw LLMError when there is neither content nor tool call', async () => {
      mockCreate.mockResolvedValueOnce({
        choices: [{ message: { content: null } }],
      });

      const provider = new OpenAIProvider('test-openai-key');
      await expect(provider.chat({ messages: USER_TURN })).rejects.toThrow(
        LLMError,
      );
    });
  });

  describe('error handling', () => {
    it('should wrap 401 errors as LLMAuthenticationError', async () => {
      await rejectWith(401, 'Invalid API key');
      const provider = new OpenAIProvider('test-openai-key');
      await expect(provider.chat({ messages: USER_TURN })).rejects.toThrow(
        LLMAuthenticationError,
      );
    });

    it('should wrap 403 errors as LLMPermissionError', async () => {
      await rejectWith(403, 'Permission denied');
      const provider = new OpenAIProvider('test-openai-key');
      await expect(provider.chat({ messages: USER_TURN })).rejects.toThrow(
        LLMPermissionError,
      );
    });

    it('should wrap 429 errors with the retry delay in milliseconds', async () => {
      await rejectWith(429, 'Rate limit exceeded', { 'retry-after': '7' });
      const provider = new OpenAIProvider('test-openai-key');

      const error = await provider
        .chat({ messages: USER_TURN })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LLMRateLimitError);
      if (error instanceof LLMRateLimitError) {
        expect(error.retryAfter).toBe(7000);
      }
    });

    it('should wrap 404 errors as ModelNotFoundError', async () => {
      await rejectWith(404, 'Model not found');
      const provider = new OpenAIProvider('test-openai-key', 'gpt-missing');
      await expect(provider.chat({ messages: USER_TURN })).rejects.toThrow(
        'Model not found: gpt-missing',
      );
      await rejectWith(404, 'Model not found');
      await expect(provider.chat({ messages: USER_TURN })).rejects.toThrow(
        ModelNotFoundError,
      );
    });

    it('should wrap context length errors as ContextLengthError', async () => {
      await rejectWith(400, 'maximum context length exceeded');
      const provider = new OpenAIProvider('test-openai-key');
      await expect(provider.chat({ messages: USER_TURN })).rejects.toThrow(
        ContextLengthError,
      );
    });

    it('should wrap content filter errors as ContentFilterError', async () => {
      await rejectWith(400, 'content_filter triggered');
      const provider = new OpenAIProvider('test-openai-key');
      await expect(provider.chat({ messages: USER_TURN })).rejects.toThrow(
        ContentFilterError,
      );
    });

    it('should wrap 5xx errors as LLMServerError', async () => {
      await rejectWith(503, 'Service unavailable');
      const provider = new OpenAIProvider('test-openai-key');
      await expect(provider.chat({ messages: USER_TURN })).rejects.toThrow(
        LLMServerError,
      );
    });

    it('should wrap unknown errors as LLMError', async () => {
      mockCreate.mockRejectedValueOnce(new Error('socket hang up'));
      const provider = new OpenAIProvider('test-openai-key');
      await expect(provider.chat({ messages: USER_TURN })).rejects.toThrow(
        'socket hang up',
      );
    });
  });

  describe('input validation', () => {
    it('should require at least one message', async () => {
      const provider = new OpenAIProvider('test-openai-key');
      await expect(provider.chat({ messages: [] })).rejects.toThrow(
        LLMValidationError,
      );
    });

    it('should reject a whitespace-only prompt', async () => {
      const provider = new OpenAIProvider('test-openai-key');
      await expect(
        provider.chat({ messages: [{ role: 'user', content: '   ' }] }),
      ).rejects.toThrow('Prompt cannot be empty');
      expect(mockCreate).not.toHaveBeenCalled();
    });

    it('should reject non-integer and non-positive maxTokens', async () => {
      const provider = new OpenAIProvider('test-openai-key');
      for (const maxTokens of [0, -1, 1.5]) {
        await expect(
          provider.chat({ messages: USER_TURN, maxTokens }),
        ).rejects.toThrow('maxTokens must be a positive integer');
      }
    });
  });
});
