/**
 * Core type definitions for gettext-translate
 */

/**
 * Settings shared by every run of the tool
 */
export interface TranslatorConfig {
  root: string;
  dryRun: boolean;
  apiKey: string;
  modelName: string;
  verbose: boolean;
  maxRetries: number;
  retryDelay: number; // base backoff in ms, doubled on every retry
}

/**
 * Settings for the `catalog` command
 */
export interface CatalogRunConfig extends TranslatorConfig {
  languages: string[];
  force: boolean;
  extension: string; // ".po"
}

/**
 * Settings for the `inline` command
 */
export interface InlineRunConfig extends TranslatorConfig {
  extension: string; // ".ex"
  functionNames: string[];
}

/**
 * Translates one string. Bound to a target language by the caller.
 */
export type TranslateFn = (text: string) => Promise<string>;

/**
 * A single-line gettext record as found by the catalog scanner
 */
export type CatalogRecord =
  | {
      kind: "singular";
      key: string;
      translation: string;
      line: number;
    }
  | {
      kind: "plural";
      key: string;
      pluralKey: string;
      translations: [string, string];
      line: number;
    };

/**
 * One gettext-style call found in source text
 */
export interface InlineLiteralMatch {
  text: string;
  payload: string;
  start: number;
  end: number;
  payloadStart: number;
  payloadEnd: number;
}

/**
 * A line that differs between two versions of a file
 */
export interface LineChange {
  lineNumber: number; // 1-based
  original: string;
  modified: string;
}

export type FileChangeSet = LineChange[];

export interface CatalogScanResult {
  content: string;
  changes: number;
  changeSet: FileChangeSet;
}

export interface InlineScanResult {
  content: string;
  changed: boolean;
  changeSet: FileChangeSet;
}
