import { describe, it, expect, vi, beforeEach } from 'vitest';

// Shared spy used by all tests
const SHARED_CREATE = vi.hoisted(() => vi.fn());

// Hoist error classes to avoid TDZ issues
const ERRORS = vi.hoisted(() => {
  class APIError extends Error {
    status: number | undefined;
    error: unknown;
    constructor(status: number | undefined, error: unknown, message: string) {
      super(message);
      this.name = 'APIError';
      this.status = status;
      this.error = error;
    }
  }

  class APIConnectionError extends APIError {
    constructor(message = 'Connection error.') {
      super(undefined, undefined, message);
      this.name = 'APIConnectionError';
    }
  }

  return { APIError, APIConnectionError };
});

const CLIENT = vi.hoisted(() =>
  // Called with `new`, so the implementation cannot be an arrow function
  vi.fn(function () {
    return { chat: { completions: { create: SHARED_CREATE } } };
  })
);

// Mock OpenAI SDK - must come before importing SUT
vi.mock('openai', () => {
  const { APIError, APIConnectionError } = ERRORS;
  const openAI = Object.assign(CLIENT, { APIError, APIConnectionError });
  return {
    __esModule: true,
    default: openAI,
    APIError,
    APIConnectionError,
  };
});

import { OpenAIProvider } from '../src/providers/openai-provider';
import { MalformedResponseError, TransportError, UpstreamError } from '../src/errors/provider-errors';
import type { CompletionRequest } from '../src/providers/llm-provider';

const REQUEST: CompletionRequest = {
  model: 'gpt-4o-mini',
  maxTokens: 300,
  systemPrompt: 'SYS',
  userPrompt: 'USER',
};

describe('OpenAIProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('creates the client without retries and with the configured timeout', () => {
    new OpenAIProvider({ apiKey: 'test-key', baseUrl: 'http://localhost:1234/v1', timeoutMs: 5000 });

    expect(CLIENT).toHaveBeenCalledWith({
      apiKey: 'test-key',
      baseURL: 'http://localhost:1234/v1',
      timeout: 5000,
      maxRetries: 0,
    });
  });

  it('sends the system prompt as a system message', async () => {
    SHARED_CREATE.mockResolvedValueOnce({ choices: [{ message: { content: 'analysis' }, finish_reason: 'stop' }] });

    const result = await new OpenAIProvider({ apiKey: 'test-key' }).complete(REQUEST);

    expect(result).toEqual({ statusCode: 200, rawText: 'analysis' });
    expect(SHARED_CREATE).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      max_tokens: 300,
      messages: [
        { role: 'system', content: 'SYS' },
        { role: 'user', content: 'USER' },
      ],
    });
  });

  it('maps API errors with a text body to UpstreamError', async () => {
    SHARED_CREATE.mockRejectedValueOnce(new ERRORS.APIError(500, undefined, '500 server busy'));

    const error = await new OpenAIProvider({ apiKey: 'test-key' }).complete(REQUEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ status: 500, body: 'server busy' });
  });

  it('keeps the JSON error object as the upstream body', async () => {
    const body = { message: 'Incorrect API key provided', type: 'invalid_request_error' };
    SHARED_CREATE.mockRejectedValueOnce(new ERRORS.APIError(401, body, '401 Incorrect API key provided'));

    const error = await new OpenAIProvider({ apiKey: 'test-key' }).complete(REQUEST).catch((e: unknown) => e);

    expect(error).toMatchObject({ status: 401, body: JSON.stringify(body) });
  });

  it('maps connection errors to TransportError', async () => {
    SHARED_CREATE.mockRejectedValueOnce(new ERRORS.APIConnectionError());

    const error = await new OpenAIProvider({ apiKey: 'test-key' }).complete(REQUEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'Connection error.' });
  });

  it('rejects responses with null content', async () => {
    SHARED_CREATE.mockResolvedValueOnce({ choices: [{ message: { content: null } }] });

    await expect(new OpenAIProvider({ apiKey: 'test-key' }).complete(REQUEST)).rejects.toThrow(
      'Malformed completion response: null message content'
    );
  });

  it('returns empty content as an empty analysis', async () => {
    SHARED_CREATE.mockResolvedValueOnce({ choices: [{ message: { content: '' } }] });

    const result = await new OpenAIProvider({ apiKey: 'test-key' }).complete(REQUEST);

    expect(result).toEqual({ statusCode: 200, rawText: '' });
  });
});
