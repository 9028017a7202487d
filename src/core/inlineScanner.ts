import type {
  InlineLiteralMatch,
  InlineScanResult,
  TranslateFn,
} from "../types";
import { Logger } from "../utils/logger";
import { diffLines } from "../utils/diff";
import { escapeLiteral, escapeRegExp } from "../utils/quotes";
import { placeholdersPreserved } from "../utils/placeholders";
import { DEFAULT_FUNCTION_NAMES } from "../utils/constants";

export interface InlineScanOptions {
  translate: TranslateFn;
  dryRun: boolean;
  functionNames?: string[];
  logger?: Logger;
}

/**
 * `gettext("...")` with an escape-aware quoted first argument and optional
 * trailing arguments. Group 1 is the raw payload.
 */
export function buildCallPattern(
  functionNames: string[] = DEFAULT_FUNCTION_NAMES
): RegExp {
  const names = functionNames.map(escapeRegExp).join("|");
  return new RegExp(
    `\\b(?:${names})\\s*\\(\\s*"((?:\\\\.|[^"\\\\])*)"\\s*(?:,\\s*[^)]*)?\\)`,
    "g"
  );
}

/**
 * Every call in `content`, in source order, with the payload's offsets
 */
export function findLiterals(
  content: string,
  pattern: RegExp = buildCallPattern()
): InlineLiteralMatch[] {
  const matches: InlineLiteralMatch[] = [];

  for (const match of content.matchAll(pattern)) {
    const start = match.index ?? 0;
    const text = match[0];
    const payload = match[1] ?? "";
    // The function name holds no quote, so the first one opens the argument
    const payloadStart = start + text.indexOf('"') + 1;

    matches.push({
      text,
      payload,
      start,
      end: start + text.length,
      payloadStart,
      payloadEnd: payloadStart + payload.length,
    });
  }

  return matches;
}

/**
 * Replace [start, end) ranges of `content`. Ranges must be sorted and must
 * not overlap.
 */
export function spliceRanges(
  content: string,
  replacements: Array<{ start: number; end: number; text: string }>
): string {
  let result = "";
  let cursor = 0;

  for (const { start, end, text } of replacements) {
    result += content.slice(cursor, start) + text;
    cursor = end;
  }

  return result + content.slice(cursor);
}

/**
 * Translate every gettext literal in a source file to English
 */
export async function scanInline(
  content: string,
  options: InlineScanOptions
): Promise<InlineScanResult> {
  const logger = options.logger ?? new Logger(false);
  const pattern = buildCallPattern(options.functionNames);
  const replacements: Array<{ start: number; end: number; text: string }> =
    [];

  for (const literal of findLiterals(content, pattern)) {
    const translated = escapeLiteral(
      await options.translate(literal.payload)
    );
    if (translated === literal.payload) {
      continue;
    }

    if (!placeholdersPreserved(literal.payload, translated)) {
      logger.warn(
        `⚠️ Placeholders differ between "${literal.payload}" and "${translated}"`
      );
    }
    logger.logChange(literal.payload, translated, "INLINE", options.dryRun);

    replacements.push({
      start: literal.payloadStart,
      end: literal.payloadEnd,
      text: translated,
    });
  }

  const updated = spliceRanges(content, replacements);
  return {
    content: updated,
    changed: replacements.length > 0,
    changeSet: diffLines(content, updated),
  };
}
