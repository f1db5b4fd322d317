import { z } from 'zod';

// Chat-completions response schemas (xAI and OpenAI share the shape)
export const CHAT_CHOICE_SCHEMA = z.object({
  message: z.object({
    content: z.string().nullable(),
  }),
  finish_reason: z.string().nullable().optional(),
});

export const CHAT_USAGE_SCHEMA = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number(),
});

export const CHAT_COMPLETION_RESPONSE_SCHEMA = z.object({
  choices: z.array(CHAT_CHOICE_SCHEMA).min(1),
  usage: CHAT_USAGE_SCHEMA.optional(),
});

export type ChatCompletionResponse = z.infer<typeof CHAT_COMPLETION_RESPONSE_SCHEMA>;
