import winston from "winston";

/**
 * Winston logger with `time`/`timeEnd` for measuring renders and pushes
 */
export interface Logger extends winston.Logger {
  time(label: string): void;
  timeEnd(label: string): void;
}

/**
 * Prefixes named in LOG_ONLY, or null when every prefix may log
 */
const getAllowedLoggers = (): Set<string> | null => {
  const logOnly = process.env.LOG_ONLY;
  if (!logOnly) return null;
  return new Set(logOnly.split(",").map((s) => s.trim()));
};

/**
 * Create the logger for one hub component.
 *
 * Lines are written to stdout as `[Prefix] message`; `transport` adds a
 * second destination (the logger tests use a stream).
 *
 * Environment:
 * - `LOG_LEVEL`: winston level, `info` when unset
 * - `LOG_ONLY`: comma-separated prefixes; every other component is silent,
 *   e.g. `LOG_ONLY=Scheduler,DisplayController` while debugging rotation
 *
 * @example
 * const logger = getLogger("LayoutResolver");
 * logger.time("resolve home");
 * // ... render placements
 * logger.timeEnd("resolve home"); // [LayoutResolver] resolve home: 42ms
 */
export const getLogger = (
  prefix: string,
  transport?: winston.transport,
): Logger => {
  const allowedLoggers = getAllowedLoggers();

  // Create a filter format that silences non-allowed loggers
  const filterFormat = winston.format((info) => {
    const label = typeof info.label === "string" ? info.label : "";
    if (allowedLoggers && !allowedLoggers.has(label)) {
      return false; // Filter out this log
    }
    return info;
  });

  const baseLogger = winston.createLogger({
    level: process.env.LOG_LEVEL || "info",
    format: winston.format.combine(
      winston.format.label({ label: prefix }),
      winston.format.timestamp(),
      filterFormat(),
      winston.format.printf(({ label, message }) => {
        return `[${label}] ${message}`;
      }),
    ),

    transports: [
      new winston.transports.Console(), // Log to stdout by default
      ...(transport ? [transport] : []),
    ],
  });

  // Map to store timer start times
  const timers = new Map<string, number>();

  const time = (label: string): void => {
    timers.set(label, Date.now());
  };

  const timeEnd = (label: string): void => {
    const startTime = timers.get(label);
    if (startTime === undefined) {
      baseLogger.warn(`Timer '${label}' does not exist`);
      return;
    }

    const duration = Date.now() - startTime;
    baseLogger.info(`${label}: ${duration}ms`);
    timers.delete(label);
  };

  // Extend the logger with timing methods
  return Object.assign(baseLogger, { time, timeEnd });
};
