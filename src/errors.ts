export enum TranslatorErrorCode {
  TRANSPORT = "TRANSPORT",
  SERVICE = "SERVICE",
  RETRY_EXHAUSTED = "RETRY_EXHAUSTED",
  MALFORMED_LINE = "MALFORMED_LINE",
  MISSING_CREDENTIAL = "MISSING_CREDENTIAL",
}

/**
 * Base class for every error raised by gettext-translate itself.
 * File system errors are not wrapped and reach the caller as-is.
 */
export class TranslatorError extends Error {
  constructor(
    message: string,
    public readonly code: TranslatorErrorCode,
    public readonly retryable: boolean = false,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "TranslatorError";
  }
}

/**
 * The remote service could not be reached
 */
export class TransportError extends TranslatorError {
  constructor(message: string, cause?: unknown) {
    super(message, TranslatorErrorCode.TRANSPORT, true, cause);
    this.name = "TransportError";
  }
}

/**
 * The remote service answered, but not with a usable success response
 */
export class ServiceError extends TranslatorError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(message, TranslatorErrorCode.SERVICE, true, cause);
    this.name = "ServiceError";
  }
}

export class RetryExhaustedError extends TranslatorError {
  constructor(
    public readonly maxRetries: number,
    public readonly lastError?: unknown
  ) {
    super(
      `Failed after ${maxRetries} retries`,
      TranslatorErrorCode.RETRY_EXHAUSTED,
      false,
      lastError
    );
    this.name = "RetryExhaustedError";
  }
}

export class MalformedLineError extends TranslatorError {
  constructor(public readonly line: string) {
    super(`Malformed .po line: ${line}`, TranslatorErrorCode.MALFORMED_LINE);
    this.name = "MalformedLineError";
  }
}

export class MissingCredentialError extends TranslatorError {
  constructor() {
    super(
      "OPENAI_API_KEY environment variable is not set and no --api-key was given",
      TranslatorErrorCode.MISSING_CREDENTIAL
    );
    this.name = "MissingCredentialError";
  }
}

/**
 * Message text of anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
