import sharp from "sharp";
import { Bitmap1Bit } from "@core/types";
import { BitmapUtils } from "@services/bitmap/BitmapUtils";
import { getLogger } from "@utils/logger";

const logger = getLogger("FramePreview");

/**
 * Expand a packed 1-bit bitmap to one greyscale byte per pixel
 * (0 for black, 255 for white)
 */
export function unpackBitmap(bitmap: Bitmap1Bit): Buffer {
  const grey = Buffer.alloc(bitmap.width * bitmap.height);
  for (let y = 0; y < bitmap.height; y++) {
    for (let x = 0; x < bitmap.width; x++) {
      grey[y * bitmap.width + x] = BitmapUtils.getPixel(bitmap, x, y)
        ? 0
        : 255;
    }
  }
  return grey;
}

/**
 * Encode a bitmap as a greyscale PNG
 */
export async function bitmapToPng(bitmap: Bitmap1Bit): Promise<Buffer> {
  const png = await sharp(unpackBitmap(bitmap), {
    raw: { width: bitmap.width, height: bitmap.height, channels: 1 },
  })
    .png()
    .toBuffer();

  logger.debug(
    `PNG generated: ${bitmap.width}x${bitmap.height}, ${png.length} bytes`,
  );
  return png;
}
