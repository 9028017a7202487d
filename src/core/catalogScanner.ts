import type {
  CatalogRecord,
  CatalogScanResult,
  TranslateFn,
} from "../types";
import { MalformedLineError } from "../errors";
import { Logger } from "../utils/logger";
import { diffLines } from "../utils/diff";
import { escapeLiteral } from "../utils/quotes";
import { placeholdersPreserved } from "../utils/placeholders";

export interface CatalogScanOptions {
  language: string; // two-letter code, used in log lines
  force: boolean;
  dryRun: boolean;
  translate: TranslateFn;
  logger?: Logger;
}

const MSGID = /^msgid\s/;
const MSGID_PLURAL = /^msgid_plural\s/;
const MSGSTR = /^msgstr\s/;
const MSGSTR_0 = /^msgstr\[0\]\s/;
const MSGSTR_1 = /^msgstr\[1\]\s/;

/**
 * Extract the text between the first and last double quote of a line,
 * e.g. `msgid "Hello"` -> `Hello`
 */
export function extractPoString(line: string): string {
  const start = line.indexOf('"');
  const end = line.lastIndexOf('"');
  if (start === -1 || end === start) {
    throw new MalformedLineError(line);
  }
  return line.slice(start + 1, end);
}

function isContinuation(line: string | undefined): boolean {
  return line !== undefined && line.trimStart().startsWith('"');
}

/**
 * Read the record starting at line `i`, or null if the lines there do not
 * have the shape of a singular or plural record
 */
export function readRecord(lines: string[], i: number): CatalogRecord | null {
  if (!MSGID.test(lines[i] ?? "")) {
    return null;
  }

  const next = lines[i + 1];
  if (next !== undefined && MSGSTR.test(next)) {
    return {
      kind: "singular",
      key: extractPoString(lines[i]),
      translation: extractPoString(next),
      line: i,
    };
  }

  if (
    i + 3 < lines.length &&
    MSGID_PLURAL.test(lines[i + 1]) &&
    MSGSTR_0.test(lines[i + 2]) &&
    MSGSTR_1.test(lines[i + 3])
  ) {
    return {
      kind: "plural",
      key: extractPoString(lines[i]),
      pluralKey: extractPoString(lines[i + 1]),
      translations: [
        extractPoString(lines[i + 2]),
        extractPoString(lines[i + 3]),
      ],
      line: i,
    };
  }

  return null;
}

export function recordSpan(record: CatalogRecord): number {
  return record.kind === "singular" ? 2 : 4;
}

/**
 * Records this scanner can rewrite: a non-empty key (the header entry has an
 * empty one) and no multi-line string continuing after the last slot.
 */
function isTranslatable(record: CatalogRecord, lines: string[]): boolean {
  const source = record.kind === "singular" ? record.key : record.pluralKey;
  return (
    source.length > 0 &&
    !isContinuation(lines[record.line + recordSpan(record)])
  );
}

export function needsTranslation(
  record: CatalogRecord,
  force: boolean
): boolean {
  if (force) {
    return true;
  }
  return record.kind === "singular"
    ? record.translation.length === 0
    : record.translations.some((slot) => slot.length === 0);
}

/**
 * Walk a .po file and fill in (or, with force, redo) every translation.
 * Plural records get the translated plural key in both slots.
 */
export async function scanCatalog(
  content: string,
  options: CatalogScanOptions
): Promise<CatalogScanResult> {
  const logger = options.logger ?? new Logger(false);
  const lines = content.split(/\r?\n/);
  // Each line keeps its own terminator, so mixed endings survive
  const terminators = content.match(/\r?\n/g) ?? [];

  let changes = 0;
  let i = 0;

  while (i < lines.length) {
    const record = readRecord(lines, i);
    if (!record) {
      i += 1;
      continue;
    }

    if (
      isTranslatable(record, lines) &&
      needsTranslation(record, options.force)
    ) {
      const source =
        record.kind === "singular" ? record.key : record.pluralKey;
      const translated = escapeLiteral(await options.translate(source));

      if (!placeholdersPreserved(source, translated)) {
        logger.warn(
          `⚠️ Placeholders differ between "${source}" and "${translated}"`
        );
      }
      logger.logChange(source, translated, options.language, options.dryRun);

      if (record.kind === "singular") {
        lines[i + 1] = `msgstr "${translated}"`;
      } else {
        lines[i + 2] = `msgstr[0] "${translated}"`;
        lines[i + 3] = `msgstr[1] "${translated}"`;
      }
      changes += 1;
    }

    i += recordSpan(record);
  }

  const updated = lines
    .map((line, k) => line + (terminators[k] ?? ""))
    .join("");
  return {
    content: updated,
    changes,
    changeSet: diffLines(content, updated),
  };
}
