import languageTable from "./languages.json";
import { FALLBACK_LANGUAGE } from "../utils/constants";

/**
 * ISO 639-1 code to English display name, loaded once and never mutated
 */
export const languageNames: ReadonlyMap<string, string> = new Map(
  Object.entries(languageTable)
);

/**
 * Full language name for a two-letter code. Unknown codes map to English.
 */
export function isoToName(code: string): string {
  return languageNames.get(code.trim().toLowerCase()) ?? FALLBACK_LANGUAGE;
}
