import { z } from 'zod';
import { ENV_SCHEMA_WITH_DEFAULTS, ProviderType, type EnvConfig } from '../schemas/env-schemas';
import { ConfigError, handleUnknownError } from '../errors/index';

export function parseEnvironment(env: unknown = process.env): EnvConfig {
  try {
    return ENV_SCHEMA_WITH_DEFAULTS.parse(env);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      const errorMessage = formatProviderValidationError(e, env);
      throw new ConfigError(`Invalid environment variables: ${errorMessage}`);
    }
    const err = handleUnknownError(e, 'Environment validation');
    throw new ConfigError(`Environment validation failed: ${err.message}`);
  }
}

function readProvider(env: unknown): string | undefined {
  if (typeof env !== 'object' || env === null || !('LLM_PROVIDER' in env)) {
    return undefined;
  }
  const value = env.LLM_PROVIDER;
  return typeof value === 'string' && value ? value : ProviderType.XAI;
}

function formatProviderValidationError(zodError: z.ZodError, env: unknown): string {
  const issues = zodError.issues;
  const providerType = readProvider(env) ?? ProviderType.XAI;

  const discriminatorIssue = issues.find(
    (issue) => issue.code === 'invalid_union_discriminator'
  );
  if (discriminatorIssue) {
    const allowed = Object.values(ProviderType).map((p) => `'${p}'`).join(', ');
    return `LLM_PROVIDER must be one of ${allowed}. Received: ${providerType}`;
  }

  const missingFields = issues
    .filter((issue) => issue.code === 'invalid_type' && issue.received === 'undefined')
    .map((issue) => issue.path.join('.'));

  if (providerType === ProviderType.XAI && missingFields.includes('XAI_API_KEY')) {
    return 'Missing required xAI environment variables: XAI_API_KEY. When using LLM_PROVIDER=xai, ensure XAI_API_KEY is set.';
  }

  if (providerType === ProviderType.OpenAI && missingFields.includes('OPENAI_API_KEY')) {
    return 'Missing required OpenAI environment variables: OPENAI_API_KEY. When using LLM_PROVIDER=openai, ensure OPENAI_API_KEY is set.';
  }

  const fieldErrors = issues.map((issue) => {
    const field = issue.path.join('.');
    return field ? `${field}: ${issue.message}` : issue.message;
  });

  return `Invalid environment variable values: ${fieldErrors.join(', ')}`;
}
