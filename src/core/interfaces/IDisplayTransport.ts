import { Result, Bitmap1Bit } from "@core/types";
import { TransportError } from "@core/errors";

/**
 * The physical display, reached one push at a time.
 * A push may take several seconds.
 */
export interface IDisplayTransport {
  readonly width: number;
  readonly height: number;

  push(bitmap: Bitmap1Bit): Promise<Result<void, TransportError>>;
}
