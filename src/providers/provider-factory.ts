import type { CompletionProvider } from './llm-provider';
import { XaiProvider, type XaiConfig } from './xai-provider';
import { OpenAIProvider, type OpenAIConfig } from './openai-provider';
import { StubProvider } from './stub-provider';
import { DefaultRequestBuilder, type RequestBuilder } from './request-builder';
import { ProviderType, type EnvConfig } from '../schemas/env-schemas';
import { DEFAULT_XAI_MODEL } from '../config/constants';

export interface ProviderOptions {
  debug?: boolean;
}

/**
 * Creates the completion backend selected by LLM_PROVIDER.
 * @param envConfig - Validated environment configuration
 * @param options - Debug options
 */
export function createProvider(envConfig: EnvConfig, options: ProviderOptions = {}): CompletionProvider {
  switch (envConfig.LLM_PROVIDER) {
    case ProviderType.XAI: {
      const xaiConfig: XaiConfig = {
        apiKey: envConfig.XAI_API_KEY,
        baseUrl: envConfig.XAI_BASE_URL,
        timeoutMs: envConfig.COMPLETION_TIMEOUT_MS,
        ...(options.debug !== undefined && { debug: options.debug }),
      };
      return new XaiProvider(xaiConfig);
    }

    case ProviderType.OpenAI: {
      const openaiConfig: OpenAIConfig = {
        apiKey: envConfig.OPENAI_API_KEY,
        timeoutMs: envConfig.COMPLETION_TIMEOUT_MS,
        ...(envConfig.OPENAI_BASE_URL !== undefined && { baseUrl: envConfig.OPENAI_BASE_URL }),
        ...(options.debug !== undefined && { debug: options.debug }),
      };
      return new OpenAIProvider(openaiConfig);
    }

    case ProviderType.Stub:
      return new StubProvider();

    default: {
      const unsupported: never = envConfig;
      return unsupported;
    }
  }
}

/**
 * Creates a request builder whose model id and token budget match the selected provider.
 */
export function createRequestBuilder(envConfig: EnvConfig): RequestBuilder {
  return new DefaultRequestBuilder({
    model: modelFor(envConfig),
    maxTokens: envConfig.COMPLETION_MAX_TOKENS,
  });
}

function modelFor(envConfig: EnvConfig): string {
  switch (envConfig.LLM_PROVIDER) {
    case ProviderType.XAI:
      return envConfig.XAI_MODEL;
    case ProviderType.OpenAI:
      return envConfig.OPENAI_MODEL;
    case ProviderType.Stub:
      return DEFAULT_XAI_MODEL;
  }
}
