import {
  BoundData,
  Rectangle,
  RenderContext,
  WidgetOptions,
  WidgetOutput,
} from "@core/types";
import { IWidget } from "@core/interfaces";
import { renderBitmapText, calculateBitmapTextHeight } from "@utils/bitmapFont";
import {
  createCanvas,
  drawPlaceholder,
  firstPayload,
  formatValue,
  getPath,
  lineHeight,
  numberOption,
  stringOption,
  truncateText,
} from "./widgetHelpers";

export const EMPTY_LIST_MESSAGE = "NOTHING TO SHOW";

/**
 * Items of an array in a provider payload, one per line.
 *
 * Options:
 * - field: dot path to the array (default `items`)
 * - itemField: dot path inside each item; the item itself when omitted
 * - title: heading drawn in bold above the items
 * - maxItems: default 5
 * - scale: default 1
 */
export class ListWidget implements IWidget {
  readonly type = "list";

  render(
    region: Rectangle,
    data: BoundData[],
    options: WidgetOptions,
    _context: RenderContext,
  ): WidgetOutput {
    const pixels = createCanvas(region);
    const payload = firstPayload(data);
    const items =
      payload === undefined
        ? undefined
        : getPath(payload, stringOption(options, "field", "items"));

    if (!Array.isArray(items)) {
      drawPlaceholder(pixels);
      return { pixels, usedFallback: true };
    }

    const scale = Math.max(1, Math.round(numberOption(options, "scale", 1)));
    const maxItems = numberOption(options, "maxItems", 5);
    const itemField = stringOption(options, "itemField", "");
    const title = stringOption(options, "title", "");
    const step = lineHeight(scale);
    const fits = (y: number) =>
      y + calculateBitmapTextHeight(scale) <= region.height;

    let y = 0;
    if (title) {
      renderBitmapText(pixels, truncateText(title, region.width, scale), 0, y, {
        scale,
        bold: true,
      });
      y += step;
    }

    if (items.length === 0) {
      if (fits(y)) {
        renderBitmapText(pixels, EMPTY_LIST_MESSAGE, 0, y, { scale });
      }
      return { pixels, usedFallback: false };
    }

    for (const item of items.slice(0, maxItems)) {
      if (!fits(y)) {
        break;
      }
      const text = formatValue(itemField ? getPath(item, itemField) : item);
      renderBitmapText(
        pixels,
        truncateText(`- ${text}`, region.width, scale),
        0,
        y,
        { scale },
      );
      y += step;
    }

    return { pixels, usedFallback: false };
  }
}
