import { QuietHours } from "@core/types";

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * Minutes after midnight for an `HH:MM` string, or null if malformed
 */
export function parseTimeOfDay(value: string): number | null {
  const match = TIME_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  return Number(match[1]) * 60 + Number(match[2]);
}

/**
 * Whether `date` (local time) falls inside the window.
 * The start is inclusive and the end exclusive; a start after the end
 * wraps past midnight, and equal bounds never match.
 */
export function isWithinQuietHours(
  quietHours: QuietHours | undefined,
  date: Date,
): boolean {
  if (!quietHours) {
    return false;
  }
  const start = parseTimeOfDay(quietHours.start);
  const end = parseTimeOfDay(quietHours.end);
  if (start === null || end === null || start === end) {
    return false;
  }

  const minutes = date.getHours() * 60 + date.getMinutes();
  if (start < end) {
    return minutes >= start && minutes < end;
  }
  return minutes >= start || minutes < end;
}
