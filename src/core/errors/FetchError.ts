import { BaseError } from "./BaseError";

/**
 * Provider fetch error codes
 */
export enum FetchErrorCode {
  NETWORK = "FETCH_NETWORK",
  HTTP_STATUS = "FETCH_HTTP_STATUS",
  AUTH = "FETCH_AUTH",
  PARSE = "FETCH_PARSE",
  TIMEOUT = "FETCH_TIMEOUT",
  UNKNOWN = "FETCH_UNKNOWN_ERROR",
}

/**
 * A provider failed to produce a payload. Isolated to that provider.
 */
export class FetchError extends BaseError {
  public readonly provider: string;

  constructor(
    provider: string,
    message: string,
    code: FetchErrorCode = FetchErrorCode.UNKNOWN,
    recoverable: boolean = true,
    context?: Record<string, unknown>,
  ) {
    super(`[${provider}] ${message}`, code, recoverable, {
      provider,
      ...context,
    });
    this.provider = provider;
  }

  static network(provider: string, error: Error): FetchError {
    return new FetchError(
      provider,
      `Network error: ${error.message}`,
      FetchErrorCode.NETWORK,
      true,
      { originalError: error.message },
    );
  }

  static httpStatus(provider: string, status: number, url: string): FetchError {
    if (status === 401 || status === 403) {
      return new FetchError(
        provider,
        `Authentication failed (HTTP ${status})`,
        FetchErrorCode.AUTH,
        false,
        { status, url },
      );
    }
    return new FetchError(
      provider,
      `Unexpected HTTP status ${status}`,
      FetchErrorCode.HTTP_STATUS,
      status >= 500 || status === 429,
      { status, url },
    );
  }

  static parse(provider: string, reason: string): FetchError {
    return new FetchError(
      provider,
      `Could not parse payload: ${reason}`,
      FetchErrorCode.PARSE,
      false,
      { reason },
    );
  }

  static timeout(provider: string, timeoutMs: number): FetchError {
    return new FetchError(
      provider,
      `Fetch timed out after ${timeoutMs}ms`,
      FetchErrorCode.TIMEOUT,
      true,
      { timeoutMs },
    );
  }

  /**
   * Wrap something a fetch capability threw instead of returning
   */
  static fromThrown(provider: string, error: Error): FetchError {
    return new FetchError(
      provider,
      `Fetch threw: ${error.message}`,
      FetchErrorCode.UNKNOWN,
      true,
      { originalError: error.message },
    );
  }
}
