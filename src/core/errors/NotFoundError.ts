import { BaseError } from "./BaseError";

export enum NotFoundErrorCode {
  PROVIDER = "NOT_FOUND_PROVIDER",
  LAYOUT = "NOT_FOUND_LAYOUT",
  JOB = "NOT_FOUND_JOB",
  FRAME = "NOT_FOUND_FRAME",
}

/**
 * An external command referenced a name that does not exist.
 * Surfaced to the caller; no state changes.
 */
export class NotFoundError extends BaseError {
  constructor(message: string, code: NotFoundErrorCode, name?: string) {
    super(message, code, false, name === undefined ? undefined : { name });
  }

  static provider(name: string): NotFoundError {
    return new NotFoundError(
      `Unknown provider: ${name}`,
      NotFoundErrorCode.PROVIDER,
      name,
    );
  }

  static layout(name: string): NotFoundError {
    return new NotFoundError(
      `Unknown layout: ${name}`,
      NotFoundErrorCode.LAYOUT,
      name,
    );
  }

  static job(key: string): NotFoundError {
    return new NotFoundError(
      `Unknown job: ${key}`,
      NotFoundErrorCode.JOB,
      key,
    );
  }

  static frame(): NotFoundError {
    return new NotFoundError(
      "No frame has been rendered yet",
      NotFoundErrorCode.FRAME,
    );
  }
}
