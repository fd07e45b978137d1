// Chat model provider abstraction
import type { ChatProvider, LLMConfig } from '@datcom/shared';
import { LLMAuthenticationError, LLMConfigurationError } from './errors.js';
import { OpenAIProvider } from './openai.js';

export { DEFAULT_OPENAI_MODEL, OpenAIProvider } from './openai.js';

export {
  LLMError,
  LLMAuthenticationError,
  LLMPermissionError,
  LLMRateLimitError,
  ModelNotFoundError,
  ContextLengthError,
  ContentFilterError,
  LLMServerError,
  LLMValidationError,
  LLMConfigurationError,
  isLLMError,
  wrapLLMError,
} from './errors.js';

/**
 * Create a chat provider based on configuration
 * @throws {LLMAuthenticationError} When the API key is missing
 * @throws {LLMConfigurationError} When the provider is unknown
 */
export function createChatProvider(config: LLMConfig): ChatProvider {
  switch (config.provider) {
    case 'openai':
      if (!config.apiKey) {
        throw new LLMAuthenticationError('OpenAI API key required');
      }
      return new OpenAIProvider(config.apiKey, config.model);

    default:
      throw new LLMConfigurationError(
        `Unknown LLM provider: ${String(config.provider)}. Supported providers: openai`,
      );
  }
}
