// Centralized request construction for provider-agnostic use
import { DEFAULT_MAX_TOKENS, DEFAULT_XAI_MODEL } from '../config/constants';
import { ValidationError } from '../errors/index';
import { ANALYSIS_PROMPT_TEMPLATE, ANALYSIS_SYSTEM_PROMPT } from '../prompts/analysis-prompt';
import { renderTemplate } from '../prompts/template-renderer';
import type { CompletionRequest } from './llm-provider';

export const EMPTY_REPORT_MESSAGE = 'Please provide a detailed emergency description.';

export type BuildResult =
  | { ok: true; request: CompletionRequest }
  | { ok: false; error: ValidationError };

export interface RequestBuilder {
  build(reportText: string, urgency: string): BuildResult;
}

export interface RequestBuilderOptions {
  model?: string;
  maxTokens?: number;
  systemPrompt?: string;
}

export class DefaultRequestBuilder implements RequestBuilder {
  private model: string;
  private maxTokens: number;
  private systemPrompt: string;

  constructor(options: RequestBuilderOptions = {}) {
    this.model = options.model ?? DEFAULT_XAI_MODEL;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.systemPrompt = options.systemPrompt ?? ANALYSIS_SYSTEM_PROMPT;
  }

  build(reportText: string, urgency: string): BuildResult {
    if (!reportText.trim()) {
      return { ok: false, error: new ValidationError(EMPTY_REPORT_MESSAGE) };
    }

    // Report text and urgency go in verbatim; urgency is not checked against the known tiers.
    const userPrompt = renderTemplate(ANALYSIS_PROMPT_TEMPLATE, { reportText, urgency });

    return {
      ok: true,
      request: {
        model: this.model,
        maxTokens: this.maxTokens,
        systemPrompt: this.systemPrompt,
        userPrompt,
      },
    };
  }
}
