/**
 * Body of a Responses API call
 */
export interface AiRequest {
  model: string;
  instructions: string;
  input: string;
}

/**
 * The part of a Responses API payload the client reads:
 * first output item, first content part, its text
 */
export interface AiResponse {
  output: Array<{
    content: Array<{ text?: string; refusal?: string }>;
  }>;
}

/**
 * Interface for AI service providers
 */
export interface AiProvider {
  /**
   * Send one request. Rejects with TransportError when the service cannot be
   * reached and ServiceError when it answers with a non-success status.
   */
  createResponse(request: AiRequest): Promise<AiResponse>;

  /**
   * Get the provider name
   */
  getProviderName(): string;
}
