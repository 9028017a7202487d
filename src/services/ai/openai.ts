import { OpenAI } from "openai";
import type { ResponseOutputItem } from "openai/resources/responses/responses";
import type { AiProvider, AiRequest, AiResponse } from "./interfaces";
import { ServiceError, TransportError } from "../../errors";
import { OPENAI_BASE_URL } from "../../utils/constants";

export function createOpenAiClient(apiKey: string): OpenAI {
  return new OpenAI({
    apiKey,
    baseURL: OPENAI_BASE_URL,
    // Retries are owned by TranslationClient
    maxRetries: 0,
  });
}

/**
 * Keep the text of output_text parts. Refusal parts carry no text, so a
 * refusal never reaches a file as a translation.
 */
export function toAiResponse(output: ResponseOutputItem[]): AiResponse {
  return {
    output: output.map((item) => ({
      content:
        item.type === "message"
          ? item.content.map((part) =>
              part.type === "output_text"
                ? { text: part.text }
                : { refusal: part.refusal }
            )
          : [],
    })),
  };
}

/**
 * OpenAI service provider implementation
 */
export class OpenAiProvider implements AiProvider {
  private client: OpenAI;

  constructor(apiKey: string, client: OpenAI = createOpenAiClient(apiKey)) {
    this.client = client;
  }

  getProviderName(): string {
    return "OpenAI";
  }

  /**
   * Call the OpenAI Responses API
   */
  async createResponse(request: AiRequest): Promise<AiResponse> {
    try {
      const response = await this.client.responses.create({
        model: request.model,
        instructions: request.instructions,
        input: request.input,
      });

      return toAiResponse(response.output);
    } catch (error) {
      // APIConnectionError extends APIError, so it is checked first
      if (error instanceof OpenAI.APIConnectionError) {
        throw new TransportError(error.message, error);
      }
      if (error instanceof OpenAI.APIError) {
        // The SDK already prefixes the message with the status
        throw new ServiceError(error.message, error.status, error);
      }
      throw error;
    }
  }
}
