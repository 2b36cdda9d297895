import * as fs from "fs/promises";
import * as path from "path";
import { IDisplayTransport } from "@core/interfaces";
import { Result, Bitmap1Bit, success, failure } from "@core/types";
import { TransportError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";
import { bitmapToPng } from "./FramePreview";

const logger = getLogger("PngFileTransport");

/**
 * Display stand-in that writes every frame to one PNG file,
 * replacing the previous frame.
 */
export class PngFileTransport implements IDisplayTransport {
  constructor(
    readonly width: number,
    readonly height: number,
    private readonly outputPath: string,
  ) {}

  async push(bitmap: Bitmap1Bit): Promise<Result<void, TransportError>> {
    if (bitmap.width !== this.width || bitmap.height !== this.height) {
      return failure(
        TransportError.sizeMismatch(
          bitmap.width,
          bitmap.height,
          this.width,
          this.height,
        ),
      );
    }

    try {
      const png = await bitmapToPng(bitmap);
      await fs.mkdir(path.dirname(this.outputPath), { recursive: true });
      await fs.writeFile(this.outputPath, png);
      logger.info(`Frame written to ${this.outputPath}`);
      return success(undefined);
    } catch (error) {
      const err = toError(error);
      logger.error(`Failed to write frame to ${this.outputPath}:`, err);
      return failure(TransportError.pushFailed(err));
    }
  }
}
