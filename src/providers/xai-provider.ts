import fetch, { FetchError, type Response } from 'node-fetch';
import type { CompletionProvider, CompletionRequest, CompletionResult } from './llm-provider';
import { extractCompletionText, parseJsonBody } from '../boundaries/api-client';
import { TransportError, UpstreamError } from '../errors/provider-errors';
import { handleUnknownError } from '../errors/index';
import { DEFAULT_TIMEOUT_MS, DEFAULT_XAI_BASE_URL } from '../config/constants';
import * as logger from '../output/logger';

export interface XaiConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  debug?: boolean;
}

export const XaiDefaultConfig = {
  baseUrl: DEFAULT_XAI_BASE_URL,
  timeoutMs: DEFAULT_TIMEOUT_MS,
};

/**
 * Wire body for POST /chat/completions. The system prompt travels as a
 * top-level `system` field next to the single user message.
 */
export interface XaiCompletionBody {
  model: string;
  max_tokens: number;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
}

export function toXaiBody(request: CompletionRequest): XaiCompletionBody {
  return {
    model: request.model,
    max_tokens: request.maxTokens,
    system: request.systemPrompt,
    messages: [{ role: 'user', content: request.userPrompt }],
  };
}

export class XaiProvider implements CompletionProvider {
  private config: Required<Omit<XaiConfig, 'debug'>> & { debug: boolean };

  constructor(config: XaiConfig) {
    this.config = {
      apiKey: config.apiKey,
      baseUrl: (config.baseUrl ?? XaiDefaultConfig.baseUrl).replace(/\/+$/, ''),
      timeoutMs: config.timeoutMs ?? XaiDefaultConfig.timeoutMs,
      debug: config.debug ?? false,
    };
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const url = `${this.config.baseUrl}/chat/completions`;

    if (this.config.debug) {
      logger.debug('Sending request to xAI:', {
        url,
        model: request.model,
        max_tokens: request.maxTokens,
        timeout_ms: this.config.timeoutMs,
      });
    }

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(toXaiBody(request)),
        timeout: this.config.timeoutMs,
      });
      text = await response.text();
    } catch (e: unknown) {
      if (e instanceof FetchError) {
        throw new TransportError(e.message, e);
      }
      const err = handleUnknownError(e, 'xAI request');
      if (err.name === 'AbortError') {
        throw new TransportError(err.message, e);
      }
      throw err;
    }

    if (!response.ok) {
      throw new UpstreamError(response.status, text);
    }

    const rawText = extractCompletionText(parseJsonBody(text));

    if (this.config.debug) {
      logger.debug('xAI response meta:', { status: response.status, chars: rawText.length });
    }

    return { statusCode: response.status, rawText };
  }
}
