/**
 * gettext-translate - translate gettext literals and .po catalogs with OpenAI
 *
 * This module exports the public API for use as a library.
 */

import { TranslationClient } from "./services/ai";
import { resolveApiKey } from "./config/settings";
import { isoToName } from "./config/languages";
import { Logger } from "./utils/logger";

export * from "./types";
export * from "./errors";

export { CatalogWorkflow } from "./core/CatalogWorkflow";
export type { CatalogRunSummary } from "./core/CatalogWorkflow";
export { InlineWorkflow } from "./core/InlineWorkflow";
export type { InlineRunSummary } from "./core/InlineWorkflow";
export {
  scanCatalog,
  extractPoString,
  readRecord,
  needsTranslation,
} from "./core/catalogScanner";
export type { CatalogScanOptions } from "./core/catalogScanner";
export {
  scanInline,
  findLiterals,
  buildCallPattern,
  spliceRanges,
} from "./core/inlineScanner";
export type { InlineScanOptions } from "./core/inlineScanner";

export {
  TranslationClient,
  OpenAiProvider,
  extractText,
} from "./services/ai";
export type {
  AiProvider,
  AiRequest,
  AiResponse,
  TranslationClientOptions,
} from "./services/ai";

export { isoToName, languageNames } from "./config/languages";
export { resolveApiKey, parseLanguageList } from "./config/settings";
export { Logger } from "./utils/logger";
export { diffLines } from "./utils/diff";
export {
  extractPlaceholders,
  placeholdersPreserved,
} from "./utils/placeholders";
export { stripQuotes, escapeLiteral } from "./utils/quotes";

/**
 * Translate a single gettext message into the language with the given
 * two-letter code, reading the key from OPENAI_API_KEY
 */
export async function translate(
  text: string,
  languageCode: string,
  options?: {
    apiKey?: string;
    modelName?: string;
  }
): Promise<string> {
  const client = TranslationClient.forOpenAi(resolveApiKey(options?.apiKey), {
    modelName: options?.modelName,
    logger: new Logger(false),
  });
  return client.translate(text, isoToName(languageCode));
}
