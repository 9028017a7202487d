import { MissingCredentialError } from "../errors";

/**
 * API key from the --api-key flag, else from OPENAI_API_KEY
 */
export function resolveApiKey(
  flag: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  const apiKey = flag || env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new MissingCredentialError();
  }
  return apiKey;
}

/**
 * Split "de, fr,,es" into ["de", "fr", "es"]
 */
export function parseLanguageList(value: string): string[] {
  return value
    .split(",")
    .map((code) => code.trim())
    .filter((code) => code.length > 0);
}

/**
 * Parse a non-negative integer option, rejecting anything else
 */
export function parseCount(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}
