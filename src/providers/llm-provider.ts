export interface CompletionRequest {
  model: string;
  maxTokens: number;
  systemPrompt: string;
  userPrompt: string;
}

export interface CompletionResult {
  statusCode: number;
  rawText: string;
}

/**
 * A completion backend. Implementations resolve with the model's text and
 * reject with UpstreamError, TransportError or MalformedResponseError.
 */
export interface CompletionProvider {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}
