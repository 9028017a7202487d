import * as path from "path";
import type { CatalogRunConfig } from "../types";
import { TranslationClient } from "../services/ai";
import { Logger } from "../utils/logger";
import {
  directoryExists,
  findFilesRecursive,
  loadText,
  saveText,
} from "../utils/filesystem";
import { isoToName } from "../config/languages";
import { scanCatalog } from "./catalogScanner";

export interface CatalogRunSummary {
  files: number;
  entries: number;
  skippedLanguages: string[];
}

/**
 * Translates the .po catalogs under `<root>/<lang>` for every requested
 * language, one file and one entry at a time
 */
export class CatalogWorkflow {
  private config: CatalogRunConfig;
  private client: TranslationClient;
  private logger: Logger;

  constructor(config: CatalogRunConfig, client?: TranslationClient) {
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

  async execute(): Promise<CatalogRunSummary> {
    const summary: CatalogRunSummary = {
      files: 0,
      entries: 0,
      skippedLanguages: [],
    };

    for (const lang of this.config.languages) {
      const langPath = path.join(this.config.root, lang);
      if (!directoryExists(langPath)) {
        this.logger.warn(`⚠️ ${langPath} folder not found. Skipping.`);
        summary.skippedLanguages.push(lang);
        continue;
      }

      for (const filePath of findFilesRecursive(
        langPath,
        this.config.extension
      )) {
        summary.entries += await this.processFile(filePath, lang);
        summary.files += 1;
      }
    }

    return summary;
  }

  /**
   * Translate one catalog; returns the number of entries changed
   */
  async processFile(filePath: string, lang: string): Promise<number> {
    const content = loadText(filePath);

    this.logger.startSpinner(`Translating ${filePath}`);
    const result = await scanCatalog(content, {
      language: lang,
      force: this.config.force,
      dryRun: this.config.dryRun,
      translate: this.client.translatorFor(isoToName(lang)),
      logger: this.logger,
    }).finally(() => this.logger.stopSpinner());

    if (result.changes === 0) {
      this.logger.logNoChanges(lang, filePath);
      return 0;
    }

    this.logger.logDiff(filePath, result.changeSet);
    this.logger.logFileSuccess(
      lang,
      result.changes,
      filePath,
      this.config.dryRun
    );

    if (!this.config.dryRun) {
      saveText(filePath, result.content);
    }

    return result.changes;
  }
}
