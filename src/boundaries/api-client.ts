import { z } from 'zod';
import { CHAT_COMPLETION_RESPONSE_SCHEMA, type ChatCompletionResponse } from '../schemas/api-schemas';
import { MalformedResponseError } from '../errors/provider-errors';
import { handleUnknownError } from '../errors/index';

/**
 * Reads `choices[0].message.content` from a chat-completions body.
 * Any other shape, or a null content field, is a malformed response.
 * Empty content is a valid answer with no sections.
 */
export function extractCompletionText(raw: unknown): string {
  let parsed: ChatCompletionResponse;
  try {
    parsed = CHAT_COMPLETION_RESPONSE_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      const detail = e.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
      throw new MalformedResponseError(detail, raw, e);
    }
    const err = handleUnknownError(e, 'API response validation');
    throw new MalformedResponseError(err.message, raw, e);
  }

  const content = parsed.choices[0]?.message.content;
  if (content === null || content === undefined) {
    throw new MalformedResponseError('null message content', raw);
  }
  return content;
}

export function parseJsonBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'JSON parsing');
    const preview = text.slice(0, 200);
    throw new MalformedResponseError(
      `${err.message}. Preview: ${preview}${text.length > 200 ? ' ...' : ''}`,
      text,
      e
    );
  }
}
