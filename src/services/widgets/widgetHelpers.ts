import { Bitmap1Bit, BoundData, Rectangle, WidgetOptions } from "@core/types";
import { BitmapUtils } from "@services/bitmap/BitmapUtils";
import {
  calculateBitmapTextHeight,
  calculateBitmapTextWidth,
  fitBitmapTextScale,
  renderBitmapText,
} from "@utils/bitmapFont";
import { isRecord } from "@utils/typeGuards";

export const NO_DATA_MESSAGE = "NO DATA";

/** Pixels between text lines, per scale step */
const LINE_GAP = 2;

/**
 * Blank white bitmap the size of a region
 */
export function createCanvas(region: Rectangle): Bitmap1Bit {
  return BitmapUtils.createBlankBitmap(region.width, region.height);
}

/**
 * Bordered box with a centred message, drawn when data is missing
 */
export function drawPlaceholder(
  bitmap: Bitmap1Bit,
  message: string = NO_DATA_MESSAGE,
): void {
  BitmapUtils.drawRect(bitmap, {
    x: 0,
    y: 0,
    width: bitmap.width,
    height: bitmap.height,
  });
  const scale = fitBitmapTextScale(
    message,
    bitmap.width - 4,
    bitmap.height - 4,
    2,
  );
  const y = (bitmap.height - calculateBitmapTextHeight(scale)) / 2;
  drawCenteredText(bitmap, message, y, scale);
}

/**
 * Region-sized placeholder for a placement that failed to render
 */
export function renderErrorPlaceholder(
  region: Rectangle,
  type: string,
): Bitmap1Bit {
  const bitmap = createCanvas(region);
  BitmapUtils.drawRect(bitmap, {
    x: 0,
    y: 0,
    width: bitmap.width,
    height: bitmap.height,
  });
  renderBitmapText(
    bitmap,
    truncateText(`ERROR: ${type}`, bitmap.width - 10, 1),
    5,
    5,
  );
  return bitmap;
}

export function drawCenteredText(
  bitmap: Bitmap1Bit,
  text: string,
  y: number,
  scale: number = 1,
  bold: boolean = false,
): void {
  const width = calculateBitmapTextWidth(text, scale);
  const x = Math.floor((bitmap.width - width) / 2);
  renderBitmapText(bitmap, text, x, Math.floor(y), { scale, bold });
}

export function lineHeight(scale: number): number {
  return calculateBitmapTextHeight(scale) + LINE_GAP * scale;
}

/**
 * Shorten text with a trailing "..." until it fits
 */
export function truncateText(
  text: string,
  maxWidth: number,
  scale: number,
): string {
  if (calculateBitmapTextWidth(text, scale) <= maxWidth) {
    return text;
  }
  const suffix = "...";
  let shortened = text;
  while (shortened.length > 0) {
    shortened = shortened.slice(0, -1);
    const candidate = shortened.trimEnd() + suffix;
    if (calculateBitmapTextWidth(candidate, scale) <= maxWidth) {
      return candidate;
    }
  }
  return suffix;
}

/**
 * Greedy word wrap. A single word wider than the line is kept on its own line.
 */
export function wrapText(
  text: string,
  maxWidth: number,
  scale: number,
): string[] {
  const lines: string[] = [];
  let current = "";

  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    const candidate = current ? `${current} ${word}` : word;
    if (calculateBitmapTextWidth(candidate, scale) <= maxWidth || !current) {
      current = candidate;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) {
    lines.push(current);
  }
  return lines;
}

/**
 * Payload of the first binding that has one
 */
export function firstPayload(
  data: BoundData[],
): Record<string, unknown> | undefined {
  return data.find((bound) => bound.value !== undefined)?.value;
}

/**
 * Read a dot-separated path such as `current.temp` or `items.0.title`
 */
export function getPath(source: unknown, path: string): unknown {
  if (path === "") {
    return source;
  }
  let current: unknown = source;
  for (const segment of path.split(".")) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (isRecord(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

export function stringOption(
  options: WidgetOptions,
  key: string,
  fallback: string,
): string {
  const value = options[key];
  return typeof value === "string" ? value : fallback;
}

export function numberOption(
  options: WidgetOptions,
  key: string,
  fallback: number,
): number {
  const value = options[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function booleanOption(
  options: WidgetOptions,
  key: string,
  fallback: boolean,
): boolean {
  const value = options[key];
  return typeof value === "boolean" ? value : fallback;
}

/**
 * Display form of a payload value
 */
export function formatValue(value: unknown, decimals?: number): string {
  if (typeof value === "number") {
    return decimals === undefined ? String(value) : value.toFixed(decimals);
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "boolean") {
    return value ? "YES" : "NO";
  }
  return JSON.stringify(value) ?? "";
}
