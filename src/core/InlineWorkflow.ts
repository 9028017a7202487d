import type { InlineRunConfig } from "../types";
import { TranslationClient } from "../services/ai";
import { Logger } from "../utils/logger";
import { findFilesRecursive, loadText, saveText } from "../utils/filesystem";
import { INLINE_TARGET_LANGUAGE } from "../utils/constants";
import { scanInline } from "./inlineScanner";

export interface InlineRunSummary {
  files: number;
  changedFiles: string[];
}

/**
 * Translates gettext() literals in source files under the root to English
 */
export class InlineWorkflow {
  private config: InlineRunConfig;
  private client: TranslationClient;
  private logger: Logger;

  constructor(config: InlineRunConfig, client?: TranslationClient) {
    this.config = config;
    this.logger = new Logger(config.verbose);
    this.client =
      client ??
      TranslationClient.forOpenAi(config.apiKey, {
        modelName: config.modelName,
        maxRetries: config.maxRetries,
        retryDelay: config.retryDelay,
        logger: this.logger,
      });
  }

  async execute(): Promise<InlineRunSummary> {
    const summary: InlineRunSummary = { files: 0, changedFiles: [] };

    for (const filePath of findFilesRecursive(
      this.config.root,
      this.config.extension
    )) {
      if (await this.processFile(filePath)) {
        summary.changedFiles.push(filePath);
      }
      summary.files += 1;
    }

    return summary;
  }

  /**
   * Translate one source file; returns whether anything changed
   */
  async processFile(filePath: string): Promise<boolean> {
    const content = loadText(filePath);

    this.logger.startSpinner(`Scanning ${filePath}`);
    const result = await scanInline(content, {
      translate: this.client.translatorFor(INLINE_TARGET_LANGUAGE),
      dryRun: this.config.dryRun,
      functionNames: this.config.functionNames,
      logger: this.logger,
    }).finally(() => this.logger.stopSpinner());

    if (!result.changed) {
      return false;
    }

    this.logger.logDiff(filePath, result.changeSet);
    if (!this.config.dryRun) {
      saveText(filePath, result.content);
    }

    return true;
  }
}
