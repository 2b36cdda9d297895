import {
  Bitmap1Bit,
  BoundData,
  Rectangle,
  RenderContext,
  WidgetOptions,
  WidgetOutput,
} from "@core/types";
import { IWidget } from "@core/interfaces";
import { fitBitmapTextScale, renderBitmapText } from "@utils/bitmapFont";
import {
  booleanOption,
  createCanvas,
  drawCenteredText,
  lineHeight,
  stringOption,
} from "./widgetHelpers";

export interface ClockFormatOptions {
  format: "12h" | "24h";
  showDate: boolean;
  showDay: boolean;
  showSeconds: boolean;
  /** IANA zone name; the process zone when omitted */
  timeZone?: string;
}

/**
 * Time and date strings for the clock face
 */
export function formatClock(
  now: Date,
  options: ClockFormatOptions,
): { time: string; date: string | null } {
  const parts = new Map(
    new Intl.DateTimeFormat("en-US", {
      timeZone: options.timeZone,
      hourCycle: "h23",
      weekday: "long",
      month: "long",
      day: "2-digit",
      year: "numeric",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    })
      .formatToParts(now)
      .map((part) => [part.type, part.value]),
  );
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.get(type) ?? "";

  const hour24 = Number(part("hour"));
  const seconds = options.showSeconds ? `:${part("second")}` : "";
  const time =
    options.format === "24h"
      ? `${part("hour")}:${part("minute")}${seconds}`
      : `${hour24 % 12 || 12}:${part("minute")}${seconds} ${
          hour24 < 12 ? "AM" : "PM"
        }`;

  let date: string | null = null;
  if (options.showDate) {
    date = options.showDay
      ? `${part("weekday")}, ${part("month")} ${part("day")}`
      : `${part("month")} ${part("day")}, ${part("year")}`;
  }
  return { time, date };
}

/**
 * Current time, optionally with the date below it.
 * Needs no provider; the time comes from the render context.
 *
 * Options: format ("12h" | "24h", default "12h"), showDate (true),
 * showDay (true), showSeconds (false), timeZone, center (false)
 */
export class ClockWidget implements IWidget {
  readonly type = "clock";

  render(
    region: Rectangle,
    _data: BoundData[],
    options: WidgetOptions,
    context: RenderContext,
  ): WidgetOutput {
    const pixels = createCanvas(region);
    const { time, date } = formatClock(context.now, {
      format: stringOption(options, "format", "12h") === "24h" ? "24h" : "12h",
      showDate: booleanOption(options, "showDate", true),
      showDay: booleanOption(options, "showDay", true),
      showSeconds: booleanOption(options, "showSeconds", false),
      timeZone: stringOption(options, "timeZone", "") || undefined,
    });
    const center = booleanOption(options, "center", false);

    const dateScale = date
      ? fitBitmapTextScale(date, region.width, region.height, 2)
      : 1;
    const dateHeight = date ? lineHeight(dateScale) : 0;
    const timeScale = fitBitmapTextScale(
      time,
      region.width,
      region.height - dateHeight,
    );

    this.drawLine(pixels, time, 0, timeScale, center, true);
    if (date) {
      this.drawLine(
        pixels,
        date,
        lineHeight(timeScale),
        dateScale,
        center,
        false,
      );
    }

    return { pixels, usedFallback: false };
  }

  private drawLine(
    pixels: Bitmap1Bit,
    text: string,
    y: number,
    scale: number,
    center: boolean,
    bold: boolean,
  ): void {
    if (center) {
      drawCenteredText(pixels, text, y, scale, bold);
    } else {
      renderBitmapText(pixels, text, 0, y, { scale, bold });
    }
  }
}
