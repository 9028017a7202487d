import type { AiProvider, AiResponse } from "./interfaces";
import { OpenAiProvider } from "./openai";
import {
  RetryExhaustedError,
  ServiceError,
  TranslatorError,
} from "../../errors";
import { Logger } from "../../utils/logger";
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_MODEL,
  DEFAULT_RETRY_DELAY_MS,
} from "../../utils/constants";
import { prompts } from "../../prompts/translation";
import { stripQuotes } from "../../utils/quotes";
import type { TranslateFn } from "../../types";

export type { AiProvider, AiRequest, AiResponse } from "./interfaces";
export { OpenAiProvider, createOpenAiClient } from "./openai";

export interface TranslationClientOptions {
  modelName?: string;
  maxRetries?: number;
  retryDelay?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Read `output[0].content[0].text` from a Responses payload
 */
export function extractText(response: AiResponse): string {
  const part = response.output[0]?.content[0];
  if (typeof part?.text === "string") {
    return part.text;
  }
  if (typeof part?.refusal === "string") {
    throw new ServiceError(`Model refused to translate: ${part.refusal}`);
  }
  throw new ServiceError("Response did not contain any output text");
}

/**
 * Sends translation requests and retries failed ones with exponential
 * backoff: retry n waits retryDelay * 2^(n-1) ms.
 */
export class TranslationClient {
  private provider: AiProvider;
  private modelName: string;
  private maxRetries: number;
  private retryDelay: number;
  private logger: Logger;
  private sleep: (ms: number) => Promise<void>;

  constructor(provider: AiProvider, options: TranslationClientOptions = {}) {
    this.provider = provider;
    this.modelName = options.modelName ?? DEFAULT_MODEL;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelay = options.retryDelay ?? DEFAULT_RETRY_DELAY_MS;
    this.logger = options.logger ?? new Logger();
    this.sleep = options.sleep ?? wait;
  }

  /**
   * Client talking to OpenAI with the given key
   */
  static forOpenAi(
    apiKey: string,
    options: TranslationClientOptions = {}
  ): TranslationClient {
    return new TranslationClient(new OpenAiProvider(apiKey), options);
  }

  /**
   * Send one instruction/input pair and return the translated text
   */
  async send(instructions: string, input: string): Promise<string> {
    for (let attempt = 1; ; attempt++) {
      try {
        const response = await this.provider.createResponse({
          model: this.modelName,
          instructions,
          input,
        });
        return stripQuotes(extractText(response));
      } catch (error) {
        if (!(error instanceof TranslatorError) || !error.retryable) {
          throw error;
        }
        if (attempt > this.maxRetries) {
          throw new RetryExhaustedError(this.maxRetries, error);
        }

        this.logger.logRetry(attempt, this.maxRetries, error.message);
        await this.sleep(this.retryDelay * 2 ** (attempt - 1));
      }
    }
  }

  /**
   * Translate a gettext message into the named language
   */
  async translate(text: string, languageName: string): Promise<string> {
    const { instructions, input } = prompts.translate(text, languageName);
    return this.send(instructions, input);
  }

  /**
   * A TranslateFn bound to one target language
   */
  translatorFor(languageName: string): TranslateFn {
    return (text) => this.translate(text, languageName);
  }
}
