import {
  BoundData,
  Rectangle,
  RenderContext,
  WidgetOptions,
  WidgetOutput,
} from "@core/types";
import { IWidget } from "@core/interfaces";
import { calculateBitmapTextHeight, renderBitmapText } from "@utils/bitmapFont";
import {
  booleanOption,
  createCanvas,
  drawCenteredText,
  lineHeight,
  numberOption,
  stringOption,
  truncateText,
  wrapText,
} from "./widgetHelpers";

/**
 * Static text.
 *
 * Options:
 * - text: string to draw
 * - scale: font scale (default 2)
 * - bold: thicker strokes (default false)
 * - center: centre horizontally, and vertically when not wrapping
 * - wrap: break into lines at word boundaries; lines that do not fit are dropped
 */
export class TextWidget implements IWidget {
  readonly type = "text";

  render(
    region: Rectangle,
    _data: BoundData[],
    options: WidgetOptions,
    _context: RenderContext,
  ): WidgetOutput {
    const pixels = createCanvas(region);
    const text = stringOption(options, "text", "");
    if (!text) {
      return { pixels, usedFallback: false };
    }

    const scale = Math.max(1, Math.round(numberOption(options, "scale", 2)));
    const bold = booleanOption(options, "bold", false);
    const center = booleanOption(options, "center", false);

    if (booleanOption(options, "wrap", false)) {
      let y = 0;
      for (const line of wrapText(text, region.width, scale)) {
        if (y + calculateBitmapTextHeight(scale) > region.height) {
          break;
        }
        const fitted = truncateText(line, region.width, scale);
        if (center) {
          drawCenteredText(pixels, fitted, y, scale, bold);
        } else {
          renderBitmapText(pixels, fitted, 0, y, { scale, bold });
        }
        y += lineHeight(scale);
      }
      return { pixels, usedFallback: false };
    }

    const fitted = truncateText(text, region.width, scale);
    if (center) {
      const y = (region.height - calculateBitmapTextHeight(scale)) / 2;
      drawCenteredText(pixels, fitted, y, scale, bold);
    } else {
      renderBitmapText(pixels, fitted, 0, 0, { scale, bold });
    }
    return { pixels, usedFallback: false };
  }
}
