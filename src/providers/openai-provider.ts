import OpenAI from 'openai';
import type { CompletionProvider, CompletionRequest, CompletionResult } from './llm-provider';
import { extractCompletionText } from '../boundaries/api-client';
import { TransportError, UpstreamError } from '../errors/provider-errors';
import { handleUnknownError } from '../errors/index';
import { DEFAULT_OPENAI_MODEL, DEFAULT_TIMEOUT_MS } from '../config/constants';
import * as logger from '../output/logger';

export interface OpenAIConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  debug?: boolean;
}

export const OpenAIDefaultConfig = {
  model: DEFAULT_OPENAI_MODEL,
  timeoutMs: DEFAULT_TIMEOUT_MS,
};

/**
 * Completion backend for OpenAI-compatible endpoints through the official SDK.
 * The system prompt is sent as a system message since the SDK has no
 * top-level `system` field.
 */
export class OpenAIProvider implements CompletionProvider {
  private client: OpenAI;
  private debug: boolean;

  constructor(config: OpenAIConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      ...(config.baseUrl !== undefined && { baseURL: config.baseUrl }),
      timeout: config.timeoutMs ?? OpenAIDefaultConfig.timeoutMs,
      // one attempt per submission
      maxRetries: 0,
    });
    this.debug = config.debug ?? false;
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      max_tokens: request.maxTokens,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt },
      ],
    };

    if (this.debug) {
      logger.debug('Sending request to OpenAI:', {
        model: params.model,
        max_tokens: params.max_tokens,
      });
    }

    let rawResponse: unknown;
    try {
      rawResponse = await this.client.chat.completions.create(params);
    } catch (e: unknown) {
      // APIConnectionError extends APIError, so check it first
      if (e instanceof OpenAI.APIConnectionError) {
        throw new TransportError(e.message, e);
      }
      if (e instanceof OpenAI.APIError) {
        throw new UpstreamError(e.status ?? 0, upstreamBody(e));
      }
      const err = handleUnknownError(e, 'OpenAI API call');
      throw err;
    }

    const rawText = extractCompletionText(rawResponse);

    if (this.debug) {
      logger.debug('OpenAI response received:', { chars: rawText.length });
    }

    return { statusCode: 200, rawText };
  }
}

// The SDK prefixes the status to the body text in `message`; the JSON error object, when present, is kept in `error`.
function upstreamBody(e: InstanceType<typeof OpenAI.APIError>): string {
  if (e.error !== undefined) {
    return JSON.stringify(e.error);
  }
  const prefix = `${e.status} `;
  return e.message.startsWith(prefix) ? e.message.slice(prefix.length) : e.message;
}
