import { Bitmap1Bit } from "@core/types";
import { BitmapUtils } from "@services/bitmap/BitmapUtils";
import font5x7 from "./fonts/font5x7.json";

/**
 * Fixed-width 5x7 bitmap font.
 *
 * Glyphs are read from `fonts/font5x7.json`: seven rows of five
 * characters each, `#` for ink. Lowercase letters are drawn as uppercase;
 * characters without a glyph advance like a space.
 */

const GLYPH_WIDTH = font5x7.width;
const GLYPH_HEIGHT = font5x7.height;
const GLYPH_SPACING = font5x7.spacing;

const glyphs = new Map<string, boolean[][]>(
  Object.entries(font5x7.glyphs).map(([char, rows]) => [
    char,
    rows.map((row) => Array.from(row, (cell) => cell === "#")),
  ]),
);

export interface BitmapTextOptions {
  /** Integer pixel multiplier, default 1 */
  scale?: number;
  /** Thicken strokes by one pixel horizontally */
  bold?: boolean;
  /** Thicken strokes horizontally and vertically */
  extraBold?: boolean;
}

export function calculateBitmapTextWidth(text: string, scale: number = 1): number {
  if (text.length === 0) {
    return 0;
  }
  return (
    text.length * GLYPH_WIDTH * scale + (text.length - 1) * GLYPH_SPACING * scale
  );
}

export function calculateBitmapTextHeight(scale: number = 1): number {
  return GLYPH_HEIGHT * scale;
}

/**
 * Largest integer scale at which `text` fits in the given box, at least 1
 */
export function fitBitmapTextScale(
  text: string,
  maxWidth: number,
  maxHeight: number,
  maxScale: number = 8,
): number {
  let scale = maxScale;
  while (
    scale > 1 &&
    (calculateBitmapTextWidth(text, scale) > maxWidth ||
      calculateBitmapTextHeight(scale) > maxHeight)
  ) {
    scale--;
  }
  return scale;
}

/**
 * Draw text in black with its top-left corner at (x, y).
 * Pixels outside the bitmap are clipped.
 */
export function renderBitmapText(
  bitmap: Bitmap1Bit,
  text: string,
  x: number,
  y: number,
  options: BitmapTextOptions = {},
): void {
  const scale = Math.max(1, Math.round(options.scale ?? 1));
  const extraBold = options.extraBold ?? false;
  const bold = extraBold || (options.bold ?? false);
  const originX = Math.round(x);
  const originY = Math.round(y);
  const advance = (GLYPH_WIDTH + GLYPH_SPACING) * scale;

  let cursorX = originX;
  for (const char of text.toUpperCase()) {
    const glyph = glyphs.get(char);
    if (glyph) {
      drawGlyph(bitmap, glyph, cursorX, originY, scale, bold, extraBold);
    }
    cursorX += advance;
  }
}

function drawGlyph(
  bitmap: Bitmap1Bit,
  glyph: boolean[][],
  x: number,
  y: number,
  scale: number,
  bold: boolean,
  extraBold: boolean,
): void {
  const blockWidth = scale + (bold ? 1 : 0);
  const blockHeight = scale + (extraBold ? 1 : 0);

  glyph.forEach((row, rowIndex) => {
    row.forEach((ink, colIndex) => {
      if (!ink) return;
      BitmapUtils.fillRect(bitmap, {
        x: x + colIndex * scale,
        y: y + rowIndex * scale,
        width: blockWidth,
        height: blockHeight,
      });
    });
  });
}
