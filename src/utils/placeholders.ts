const PLACEHOLDER_PATTERN = /%\{[^{}]*\}/g;

/**
 * All `%{name}` tokens in a string, sorted so order does not matter
 */
export function extractPlaceholders(text: string): string[] {
  return (text.match(PLACEHOLDER_PATTERN) ?? []).sort();
}

/**
 * True when the translation carries exactly the placeholders of the source,
 * counting repeats
 */
export function placeholdersPreserved(
  source: string,
  translated: string
): boolean {
  const expected = extractPlaceholders(source);
  const actual = extractPlaceholders(translated);
  return (
    expected.length === actual.length &&
    expected.every((token, i) => token === actual[i])
  );
}
