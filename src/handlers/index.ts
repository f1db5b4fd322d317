import type { EnvConfig } from '../schemas/env-schemas';
import type { CompletionProvider } from '../providers/llm-provider';
import type { RequestBuilder } from '../providers/request-builder';
import { createProvider, createRequestBuilder, type ProviderOptions } from '../providers/provider-factory';
import { createReportHandler } from './report-handler';
import { createWeatherHandler } from './weather-handler';
import { createImageHandler } from './image-handler';
import { systemClock, type Clock, type DeskHandlers } from './types';

export interface DeskDependencies {
  builder: RequestBuilder;
  provider: CompletionProvider;
  now?: Clock;
}

export function createHandlers(deps: DeskDependencies): DeskHandlers {
  const now = deps.now ?? systemClock;
  return {
    report: createReportHandler({ builder: deps.builder, provider: deps.provider, now }),
    weather: createWeatherHandler(now),
    image: createImageHandler(),
  };
}

/**
 * Wires the handlers from validated environment configuration.
 */
export function createHandlersFromEnv(env: EnvConfig, options: ProviderOptions = {}): DeskHandlers {
  return createHandlers({
    builder: createRequestBuilder(env),
    provider: createProvider(env, options),
  });
}
