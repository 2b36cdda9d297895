import { getUserMessage as getErrorUserMessage } from "./ErrorMessages";

/**
 * Root of the hub's error families (config, fetch, render, transport,
 * not-found). Services return these inside a `Result` instead of throwing;
 * the `code` selects the operator-facing text in ErrorMessages.ts.
 */
export abstract class BaseError extends Error {
  /**
   * `<FAMILY>_<REASON>`, e.g. `FETCH_HTTP_STATUS`
   */
  public readonly code: string;

  /** When the error was created */
  public readonly timestamp: Date;

  /**
   * Provider, layout or file the error concerns
   */
  public readonly context?: Record<string, unknown>;

  /**
   * Whether retrying the same operation later may succeed
   */
  public readonly recoverable: boolean;

  constructor(
    message: string,
    code: string,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message);

    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = this.constructor.name;
    this.code = code;
    this.timestamp = new Date();
    this.recoverable = recoverable;
    this.context = context;
  }

  /**
   * Plain object for debug logs of rejected reloads
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      recoverable: this.recoverable,
      context: this.context,
      stack: this.stack,
    };
  }

  /**
   * Text for the operator, as shown in delivery status and startup errors
   */
  getUserMessage(): string {
    return getErrorUserMessage(this.code);
  }
}
