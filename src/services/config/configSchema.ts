/**
 * Hub Configuration Schema
 *
 * Zod schema for the JSON configuration file. Parsing fills in defaults;
 * the cross-checks at the end catch references that the per-field rules
 * cannot see (rotation entries, region bounds, provider URLs).
 */

import { z } from "zod";
import { DisplayMode, HubConfig, Result, success, failure } from "@core/types";
import { ConfigError } from "@core/errors";
import {
  DISPLAY_DEFAULT_WIDTH,
  DISPLAY_DEFAULT_HEIGHT,
  DISPLAY_DEFAULT_MOCK_LATENCY_MS,
  DISPLAY_DEFAULT_OUTPUT_PATH,
  SCHEDULE_DEFAULT_ROTATION_INTERVAL_SECONDS,
  PROVIDER_DEFAULT_REFRESH_INTERVAL_SECONDS,
  PROVIDER_DEFAULT_MAX_AGE_SECONDS,
  PROVIDER_DEFAULT_FETCH_TIMEOUT_SECONDS,
} from "@core/constants";
import { parseTimeOfDay } from "@services/scheduler/quietHours";

// ============================================================================
// Common Schemas
// ============================================================================

const positiveSeconds = (fallback: number) =>
  z
    .number({ message: "must be a number of seconds" })
    .positive()
    .default(fallback);

const timeOfDaySchema = z
  .string()
  .refine((value) => parseTimeOfDay(value) !== null, {
    message: "must be a time of day as HH:MM",
  });

/**
 * Rectangle in display pixels
 */
export const regionSchema = z.object({
  x: z.number().int().nonnegative(),
  y: z.number().int().nonnegative(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

const optionsSchema = z.record(z.unknown()).default({});

// ============================================================================
// Sections
// ============================================================================

export const displaySchema = z.object({
  width: z.number().int().positive().default(DISPLAY_DEFAULT_WIDTH),
  height: z.number().int().positive().default(DISPLAY_DEFAULT_HEIGHT),
  transport: z.enum(["mock", "png"]).default("mock"),
  mockLatencyMs: z
    .number()
    .int()
    .nonnegative()
    .default(DISPLAY_DEFAULT_MOCK_LATENCY_MS),
  outputPath: z.string().min(1).default(DISPLAY_DEFAULT_OUTPUT_PATH),
});

export const scheduleSchema = z.object({
  mode: z.nativeEnum(DisplayMode).default(DisplayMode.MANUAL),
  rotationIntervalSeconds: positiveSeconds(
    SCHEDULE_DEFAULT_ROTATION_INTERVAL_SECONDS,
  ),
  layoutSequence: z.array(z.string().min(1)).default([]),
  quietHours: z
    .object({
      start: timeOfDaySchema,
      end: timeOfDaySchema,
    })
    .optional(),
});

export const providerSchema = z.object({
  kind: z.enum(["static", "http_json"]),
  enabled: z.boolean().default(true),
  refreshIntervalSeconds: positiveSeconds(
    PROVIDER_DEFAULT_REFRESH_INTERVAL_SECONDS,
  ),
  maxAgeSeconds: positiveSeconds(PROVIDER_DEFAULT_MAX_AGE_SECONDS),
  fetchTimeoutSeconds: positiveSeconds(PROVIDER_DEFAULT_FETCH_TIMEOUT_SECONDS),
  credentialsRef: z.string().min(1).optional(),
  options: optionsSchema,
});

export const widgetSchema = z.object({
  type: z.string().min(1),
  region: regionSchema,
  providers: z.array(z.string().min(1)).default([]),
  refreshOnDemand: z.boolean().default(true),
  options: optionsSchema,
});

export const layoutSchema = z.object({
  widgets: z.array(widgetSchema).default([]),
});

// ============================================================================
// Hub Configuration
// ============================================================================

export const hubConfigSchema = z
  .object({
    display: displaySchema.default({}),
    schedule: scheduleSchema.default({}),
    providers: z.record(providerSchema).default({}),
    layouts: z.record(layoutSchema).default({}),
  })
  .superRefine((config, ctx) => {
    config.schedule.layoutSequence.forEach((name, index) => {
      if (!Object.hasOwn(config.layouts, name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `unknown layout "${name}"`,
          path: ["schedule", "layoutSequence", index],
        });
      }
    });

    if (
      config.schedule.mode === DisplayMode.AUTO_ROTATE &&
      config.schedule.layoutSequence.length === 0
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "auto_rotate needs at least one layout",
        path: ["schedule", "layoutSequence"],
      });
    }

    for (const [layoutName, layout] of Object.entries(config.layouts)) {
      layout.widgets.forEach((widget, index) => {
        const { x, y, width, height } = widget.region;
        if (
          x + width > config.display.width ||
          y + height > config.display.height
        ) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `region ${width}x${height}+${x}+${y} exceeds the ${config.display.width}x${config.display.height} display`,
            path: ["layouts", layoutName, "widgets", index, "region"],
          });
        }
      });
    }

    for (const [name, provider] of Object.entries(config.providers)) {
      if (provider.kind !== "http_json") {
        continue;
      }
      const url = provider.options.url;
      if (typeof url !== "string" || !isHttpUrl(url)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "http_json providers need an http(s) url",
          path: ["providers", name, "options", "url"],
        });
      }
    }
  });

function isHttpUrl(value: string): boolean {
  try {
    const protocol = new URL(value).protocol;
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Format zod issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.join(".");
    return field ? `${field}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a raw configuration tree and fill in defaults
 */
export function validateConfig(raw: unknown): Result<HubConfig, ConfigError> {
  const parsed = hubConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return failure(ConfigError.invalidConfig(formatIssues(parsed.error)));
  }
  const config: HubConfig = parsed.data;
  return success(config);
}
