import {
  BoundData,
  Rectangle,
  RenderContext,
  WidgetOptions,
  WidgetOutput,
} from "@core/types";
import { IWidget } from "@core/interfaces";
import { fitBitmapTextScale, renderBitmapText } from "@utils/bitmapFont";
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

/**
 * One field of a provider payload, with an optional label above it.
 *
 * Options:
 * - field: dot path into the payload, e.g. `current.temperature`
 * - label: caption drawn at scale 1
 * - unit: appended to the value as is
 * - decimals: fixed number of decimals for numeric values
 */
export class ValueWidget implements IWidget {
  readonly type = "value";

  render(
    region: Rectangle,
    data: BoundData[],
    options: WidgetOptions,
    _context: RenderContext,
  ): WidgetOutput {
    const pixels = createCanvas(region);
    const payload = firstPayload(data);
    const value =
      payload === undefined
        ? undefined
        : getPath(payload, stringOption(options, "field", ""));

    if (value === undefined || value === null) {
      drawPlaceholder(pixels);
      return { pixels, usedFallback: true };
    }

    const label = stringOption(options, "label", "");
    const decimals = numberOption(options, "decimals", -1);
    const text =
      formatValue(value, decimals >= 0 ? decimals : undefined) +
      stringOption(options, "unit", "");

    let y = 0;
    if (label) {
      renderBitmapText(pixels, truncateText(label, region.width, 1), 0, 0);
      y = lineHeight(1);
    }

    const scale = fitBitmapTextScale(text, region.width, region.height - y);
    renderBitmapText(pixels, truncateText(text, region.width, scale), 0, y, {
      scale,
      bold: true,
    });

    return { pixels, usedFallback: false };
  }
}
