// OpenAI chat provider with function calling
import type {
  ChatCompletion,
  ChatMessage,
  ChatOptions,
  ChatProvider,
  ChatToolCall,
  ChatToolSchema,
} from '@datcom/shared';
import OpenAI, { APIError } from 'openai';
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
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

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

/**
 * OpenAI chat completions provider
 */
export class OpenAIProvider implements ChatProvider {
  private client: OpenAI;

  constructor(
    apiKey: string,
    private model = DEFAULT_OPENAI_MODEL,
  ) {
    if (!apiKey) {
      throw new LLMAuthenticationError('OpenAI API key is required');
    }
    this.client = new OpenAI({ apiKey });
  }

  getModel(): string {
    return this.model;
  }

  /**
   * Run one chat turn, letting the model call any of the given tools
   */
  async chat(options: ChatOptions): Promise<ChatCompletion> {
    this.validateOptions(options);

    const tools = options.tools?.map(toOpenAITool) ?? [];

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: options.messages.map(toOpenAIMessage),
        ...(tools.length > 0 && { tools, tool_choice: 'auto' as const }),
        ...(options.maxTokens !== undefined && {
          max_tokens: options.maxTokens,
        }),
        // Some models reject temperature, so only send it when configured
        ...(options.temperature !== undefined && {
          temperature: options.temperature,
        }),
      });

      const message = response.choices[0]?.message;
      if (!message) {
        throw new LLMError('No choices in response');
      }

      const toolCalls: ChatToolCall[] = [];
      for (const call of message.tool_calls ?? []) {
        if (call.type === 'function') {
          toolCalls.push({
            id: call.id,
            name: call.function.name,
            arguments: call.function.arguments,
          });
        }
      }

      const content = message.content ?? null;
      if (!content && toolCalls.length === 0) {
        throw new LLMError('No content in response');
      }

      return { content, toolCalls };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  private validateOptions(options: ChatOptions): void {
    if (options.messages.length === 0) {
      throw new LLMValidationError(
        'At least one message is required',
        'messages',
      );
    }
    const last = options.messages[options.messages.length - 1];
    if (last?.role === 'user' && !last.content.trim()) {
      throw new LLMValidationError('Prompt cannot be empty', 'messages');
    }
    if (
      options.maxTokens !== undefined &&
      (!Number.isInteger(options.maxTokens) || options.maxTokens <= 0)
    ) {
      throw new LLMValidationError(
        'maxTokens must be a positive integer',
        'maxTokens',
      );
    }
  }

  /**
   * Convert OpenAI errors to our error types
   */
  private handleError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    if (error instanceof APIError) {
      const message = error.message || 'OpenAI API error';
      const status = error.status;

      if (status === 401) {
        return new LLMAuthenticationError('Invalid OpenAI API key', error);
      }

      if (status === 403) {
        return new LLMPermissionError(
          `OpenAI denied access to ${this.model}: ${message}`,
          error,
        );
      }

      if (status === 429) {
        return new LLMRateLimitError(
          'OpenAI rate limit exceeded',
          this.parseRetryAfter(error),
          error,
        );
      }

      if (status === 404) {
        return new ModelNotFoundError(
          `Model not found: ${this.model}`,
          this.model,
          error,
        );
      }

      if (status === 400) {
        if (
          message.includes('context_length') ||
          message.includes('maximum context')
        ) {
          return new ContextLengthError(message, error);
        }
        if (message.includes('content_filter') || message.includes('safety')) {
          return new ContentFilterError(message, error);
        }
      }

      if (status !== undefined && status >= 500) {
        return new LLMServerError(
          `OpenAI server error (${status}): ${message}`,
          status,
          error,
        );
      }

      return new LLMError(message, error);
    }

    if (error instanceof Error) {
      return new LLMError(error.message, error);
    }

    return new LLMError(`Unknown error: ${String(error)}`);
  }

  /**
   * Parse retry-after header from rate limit errors
   */
  private parseRetryAfter(error: APIError): number | undefined {
    const headers = error.headers;
    if (headers && 'retry-after' in headers) {
      const value = headers['retry-after'];
      if (typeof value === 'string') {
        const seconds = Number.parseInt(value, 10);
        if (!Number.isNaN(seconds)) {
          return seconds * 1000;
        }
      }
    }
    return undefined;
  }
}

function toOpenAITool(tool: ChatToolSchema): ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'tool':
      return {
        role: 'tool',
        tool_call_id: message.toolCallId,
        content: message.content,
      };
    case 'assistant': {
      if (!message.toolCalls || message.toolCalls.length === 0) {
        return { role: 'assistant', content: message.content };
      }
      return {
        role: 'assistant',
        content: message.content,
        tool_calls: message.toolCalls.map((call) => ({
          id: call.id,
          type: 'function' as const,
          function: { name: call.name, arguments: call.arguments },
        })),
      };
    }
  }
}
