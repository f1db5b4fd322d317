import { z } from 'zod';
import {
  DEFAULT_HOST,
  DEFAULT_MAX_TOKENS,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_PORT,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_XAI_BASE_URL,
  DEFAULT_XAI_MODEL,
} from '../config/constants';

export enum ProviderType {
  XAI = 'xai',
  OpenAI = 'openai',
  Stub = 'stub',
}

// Settings shared by every provider
const COMPLETION_SCHEMA = z.object({
  COMPLETION_MAX_TOKENS: z.coerce.number().int().positive().default(DEFAULT_MAX_TOKENS),
  COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

const SERVER_SCHEMA = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  HOST: z.string().min(1).default(DEFAULT_HOST),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

// xAI configuration schema
const XAI_CONFIG_SCHEMA = z.object({
  XAI_API_KEY: z.string().min(1),
  XAI_BASE_URL: z.string().url().default(DEFAULT_XAI_BASE_URL),
  XAI_MODEL: z.string().min(1).default(DEFAULT_XAI_MODEL),
});

// OpenAI-compatible configuration schema
const OPENAI_CONFIG_SCHEMA = z.object({
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_MODEL: z.string().min(1).default(DEFAULT_OPENAI_MODEL),
});

// Discriminated union based on provider type
export const ENV_SCHEMA = z
  .discriminatedUnion('LLM_PROVIDER', [
    z.object({ LLM_PROVIDER: z.literal(ProviderType.XAI) }).merge(XAI_CONFIG_SCHEMA),
    z.object({ LLM_PROVIDER: z.literal(ProviderType.OpenAI) }).merge(OPENAI_CONFIG_SCHEMA),
    z.object({ LLM_PROVIDER: z.literal(ProviderType.Stub) }),
  ])
  .and(COMPLETION_SCHEMA)
  .and(SERVER_SCHEMA);

// No LLM_PROVIDER means the xAI endpoint
export const ENV_SCHEMA_WITH_DEFAULTS = z.preprocess(
  (data: unknown) => {
    if (typeof data === 'object' && data !== null && !('LLM_PROVIDER' in data && data.LLM_PROVIDER)) {
      return { ...data, LLM_PROVIDER: ProviderType.XAI };
    }
    return data;
  },
  ENV_SCHEMA
);

export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
