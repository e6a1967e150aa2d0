import { AnthropicProvider, OpenAICompatibleProvider, type LLMProvider } from './llm-provider.js';
import { ANTHROPIC_MODEL } from './anthropic.js';
import { LLM_TIMEOUT_MS, getProviderName } from './config.js';

/** Model used by the OpenAI-compatible provider. */
export const OPENAI_COMPAT_MODEL = process.env.OPENAI_COMPAT_MODEL ?? 'gpt-4o-mini';

export function createProvider(): LLMProvider {
  if (getProviderName() === 'openai-compatible') {
    const apiKey = process.env.OPENAI_COMPAT_API_KEY;
    if (!apiKey) {
      throw new Error('OPENAI_COMPAT_API_KEY environment variable is required when LLM_PROVIDER=openai-compatible');
    }
    const baseUrl = process.env.OPENAI_COMPAT_BASE_URL ?? 'https://api.openai.com/v1';
    return new OpenAICompatibleProvider({ apiKey, baseUrl, timeoutMs: LLM_TIMEOUT_MS });
  }

  // Anthropic lazily initializes its client on first use.
  return new AnthropicProvider();
}

/**
 * Default model for the active provider.
 */
export function getDefaultModel(): string {
  return getProviderName() === 'openai-compatible' ? OPENAI_COMPAT_MODEL : ANTHROPIC_MODEL;
}
