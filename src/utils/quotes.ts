/**
 * Remove one pair of surrounding double quotes, if present
 */
export function stripQuotes(text: string): string {
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
    return text.slice(1, -1);
  }
  return text;
}

const LITERAL_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

/**
 * Escape text so it fits on one line inside a "..." literal. Escape
 * sequences already present (`\"`, `\\`, `\n`, `\r`, `\t`) are kept.
 */
export function escapeLiteral(text: string): string {
  return text.replace(
    /\\(["\\nrt])|[\\"\n\r\t]/g,
    (match: string, escaped: string | undefined) =>
      escaped === undefined ? LITERAL_ESCAPES[match] ?? match : match
  );
}

/**
 * Escape a string for literal use inside a RegExp
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
