import { Bitmap1Bit, Rectangle } from "@core/types";
import { getLogger } from "@utils/logger";

const logger = getLogger("BitmapUtils");

/**
 * Utility class for 1-bit bitmap manipulation.
 *
 * Provides the drawing primitives widgets and the layout compositor need:
 * - Bitmap creation
 * - Pixel access
 * - Horizontal and vertical lines, rectangles
 * - Opaque, clipped blitting of one bitmap into another
 *
 * A set bit is white and a cleared bit is black; `value = true` in the
 * pixel helpers means black.
 */
export class BitmapUtils {
  /**
   * Create a blank bitmap of specified dimensions
   * @param fill true for an all-black bitmap
   */
  static createBlankBitmap(
    width: number,
    height: number,
    fill: boolean = false,
  ): Bitmap1Bit {
    logger.debug(`Creating blank bitmap: ${width}x${height}, fill=${fill}`);
    const w = Math.max(0, Math.floor(width));
    const h = Math.max(0, Math.floor(height));
    const bytesPerRow = Math.ceil(w / 8);

    // 0xFF (white) or 0x00 (black)
    const data = new Uint8Array(bytesPerRow * h);
    data.fill(fill ? 0x00 : 0xff);

    return { width: w, height: h, data };
  }

  static getBytesPerRow(bitmap: Bitmap1Bit): number {
    return Math.ceil(bitmap.width / 8);
  }

  /**
   * Set a pixel. Out-of-bounds coordinates are ignored.
   * @param value true for black, false for white
   */
  static setPixel(
    bitmap: Bitmap1Bit,
    x: number,
    y: number,
    value: boolean = true,
  ): void {
    if (x < 0 || x >= bitmap.width || y < 0 || y >= bitmap.height) {
      return;
    }
    const px = x | 0;
    const py = y | 0;

    const byteIndex = py * BitmapUtils.getBytesPerRow(bitmap) + (px >> 3);
    const bitIndex = 7 - (px & 7);

    if (value) {
      bitmap.data[byteIndex] &= ~(1 << bitIndex);
    } else {
      bitmap.data[byteIndex] |= 1 << bitIndex;
    }
  }

  /**
   * @returns true if the pixel is black; out-of-bounds reads as white
   */
  static getPixel(bitmap: Bitmap1Bit, x: number, y: number): boolean {
    if (x < 0 || x >= bitmap.width || y < 0 || y >= bitmap.height) {
      return false;
    }
    const byteIndex =
      (y | 0) * BitmapUtils.getBytesPerRow(bitmap) + ((x | 0) >> 3);
    const bitIndex = 7 - ((x | 0) & 7);
    return ((bitmap.data[byteIndex] >> bitIndex) & 1) === 0;
  }

  static countBlackPixels(bitmap: Bitmap1Bit): number {
    let count = 0;
    for (let y = 0; y < bitmap.height; y++) {
      for (let x = 0; x < bitmap.width; x++) {
        if (BitmapUtils.getPixel(bitmap, x, y)) {
          count++;
        }
      }
    }
    return count;
  }

  /**
   * Draw a horizontal line, clipped to the bitmap
   */
  static drawHorizontalLine(
    bitmap: Bitmap1Bit,
    x: number,
    y: number,
    width: number,
    thickness: number = 1,
  ): void {
    if (y >= bitmap.height || x >= bitmap.width || width <= 0) {
      return;
    }
    const startX = Math.max(x, 0);
    const endX = Math.min(x + width, bitmap.width);

    for (let t = 0; t < thickness; t++) {
      const row = y + t;
      if (row < 0) continue;
      if (row >= bitmap.height) break;
      for (let col = startX; col < endX; col++) {
        BitmapUtils.setPixel(bitmap, col, row, true);
      }
    }
  }

  /**
   * Draw a vertical line, clipped to the bitmap
   */
  static drawVerticalLine(
    bitmap: Bitmap1Bit,
    x: number,
    y: number,
    height: number,
    width: number = 1,
  ): void {
    if (x >= bitmap.width || y >= bitmap.height || height <= 0) {
      return;
    }
    const startY = Math.max(y, 0);
    const endY = Math.min(y + height, bitmap.height);
    const startX = Math.max(x, 0);
    const endX = Math.min(x + width, bitmap.width);

    for (let row = startY; row < endY; row++) {
      for (let col = startX; col < endX; col++) {
        BitmapUtils.setPixel(bitmap, col, row, true);
      }
    }
  }

  /**
   * Draw a rectangle outline
   */
  static drawRect(
    bitmap: Bitmap1Bit,
    rect: Rectangle,
    thickness: number = 1,
  ): void {
    if (rect.width <= 0 || rect.height <= 0) {
      return;
    }
    const t = Math.min(thickness, rect.width, rect.height);
    BitmapUtils.drawHorizontalLine(bitmap, rect.x, rect.y, rect.width, t);
    BitmapUtils.drawHorizontalLine(
      bitmap,
      rect.x,
      rect.y + rect.height - t,
      rect.width,
      t,
    );
    BitmapUtils.drawVerticalLine(bitmap, rect.x, rect.y, rect.height, t);
    BitmapUtils.drawVerticalLine(
      bitmap,
      rect.x + rect.width - t,
      rect.y,
      rect.height,
      t,
    );
  }

  /**
   * Fill a rectangle with black or white
   */
  static fillRect(
    bitmap: Bitmap1Bit,
    rect: Rectangle,
    value: boolean = true,
  ): void {
    const startX = Math.max(rect.x, 0);
    const endX = Math.min(rect.x + rect.width, bitmap.width);
    const startY = Math.max(rect.y, 0);
    const endY = Math.min(rect.y + rect.height, bitmap.height);

    for (let row = startY; row < endY; row++) {
      for (let col = startX; col < endX; col++) {
        BitmapUtils.setPixel(bitmap, col, row, value);
      }
    }
  }

  /**
   * Copy `source` into `target` with its top-left corner at (x, y).
   * The copy is opaque: white source pixels overwrite black target pixels.
   * Pixels falling outside the target are clipped.
   */
  static blit(
    target: Bitmap1Bit,
    source: Bitmap1Bit,
    x: number,
    y: number,
  ): void {
    const startCol = Math.max(0, -x);
    const startRow = Math.max(0, -y);
    const endCol = Math.min(source.width, target.width - x);
    const endRow = Math.min(source.height, target.height - y);

    for (let row = startRow; row < endRow; row++) {
      for (let col = startCol; col < endCol; col++) {
        BitmapUtils.setPixel(
          target,
          x + col,
          y + row,
          BitmapUtils.getPixel(source, col, row),
        );
      }
    }
  }

  /**
   * Copy of a bitmap with its own data buffer
   */
  static clone(bitmap: Bitmap1Bit): Bitmap1Bit {
    return {
      width: bitmap.width,
      height: bitmap.height,
      data: new Uint8Array(bitmap.data),
    };
  }
}
