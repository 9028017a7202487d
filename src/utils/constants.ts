/**
 * Constants used throughout the application
 */

export const DEFAULT_MODEL = "gpt-4o-mini";

// Requests go to `${OPENAI_BASE_URL}/responses`
export const OPENAI_BASE_URL = "https://api.openai.com/v1";

// Retry policy: 100ms, 200ms, 400ms ... up to 5 retries (6 attempts)
export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_RETRY_DELAY_MS = 100;

export const CATALOG_EXTENSION = ".po";
export const INLINE_EXTENSION = ".ex";
export const DEFAULT_FUNCTION_NAMES = ["gettext"];

export const FALLBACK_LANGUAGE = "English";

// Inline literals are always translated to English
export const INLINE_TARGET_LANGUAGE = "English";
