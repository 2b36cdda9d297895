import { BaseError } from "./BaseError";

export enum TransportErrorCode {
  PUSH_FAILED = "TRANSPORT_PUSH_FAILED",
  SIZE_MISMATCH = "TRANSPORT_SIZE_MISMATCH",
  BUSY = "TRANSPORT_BUSY",
  UNKNOWN = "TRANSPORT_UNKNOWN_ERROR",
}

/**
 * The display transport did not accept a frame.
 * Logged and recorded; the next scheduled or manual push proceeds normally.
 */
export class TransportError extends BaseError {
  constructor(
    message: string,
    code: TransportErrorCode = TransportErrorCode.UNKNOWN,
    recoverable: boolean = true,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  static pushFailed(error: Error): TransportError {
    return new TransportError(
      `Failed to push frame to display: ${error.message}`,
      TransportErrorCode.PUSH_FAILED,
      true,
      { originalError: error.message },
    );
  }

  static sizeMismatch(
    bitmapWidth: number,
    bitmapHeight: number,
    displayWidth: number,
    displayHeight: number,
  ): TransportError {
    return new TransportError(
      `Bitmap size (${bitmapWidth}x${bitmapHeight}) does not match display (${displayWidth}x${displayHeight})`,
      TransportErrorCode.SIZE_MISMATCH,
      false,
      { bitmapWidth, bitmapHeight, displayWidth, displayHeight },
    );
  }

  static busy(): TransportError {
    return new TransportError(
      "Display is busy with a previous push",
      TransportErrorCode.BUSY,
      true,
    );
  }
}
