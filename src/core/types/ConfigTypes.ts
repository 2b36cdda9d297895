import { DisplayMode, Rectangle } from "./DisplayTypes";
import { WidgetOptions } from "./LayoutTypes";
import { QuietHours } from "./SchedulerTypes";

/**
 * Hub configuration tree, after defaults and validation
 */
export type HubConfig = {
  /** Display hardware configuration */
  display: DisplayConfig;

  /** Rotation and initial mode */
  schedule: ScheduleConfig;

  /** Data providers keyed by name */
  providers: Record<string, ProviderConfig>;

  /** Layouts keyed by name */
  layouts: Record<string, LayoutConfig>;
};

/**
 * Which transport receives rendered frames
 * - mock: in-memory, simulated latency
 * - png: writes each frame to a PNG file
 */
export type DisplayTransportKind = "mock" | "png";

export type DisplayConfig = {
  /** Display width in pixels */
  width: number;

  /** Display height in pixels */
  height: number;

  transport: DisplayTransportKind;

  /** Simulated push duration for the mock transport */
  mockLatencyMs: number;

  /** Target file of the png transport */
  outputPath: string;
};

export type ScheduleConfig = {
  /** Mode applied at start */
  mode: DisplayMode;

  /** Seconds between rotation ticks */
  rotationIntervalSeconds: number;

  /** Layout names cycled by auto-rotation */
  layoutSequence: string[];

  /** Window in which rotation ticks are skipped */
  quietHours?: QuietHours;
};

/**
 * Built-in fetch capabilities
 * - static: returns the payload given in options
 * - http_json: GETs options.url and returns the parsed JSON body
 */
export type ProviderKind = "static" | "http_json";

export type ProviderConfig = {
  kind: ProviderKind;

  /** Disabled providers get no slot and no job */
  enabled: boolean;

  /** Seconds between scheduled refreshes */
  refreshIntervalSeconds: number;

  /** Seconds after which the cached value counts as stale */
  maxAgeSeconds: number;

  /** Seconds before a fetch attempt is abandoned */
  fetchTimeoutSeconds: number;

  /** Name of the environment variable holding the credential */
  credentialsRef?: string;

  options: Record<string, unknown>;
};

export type WidgetConfig = {
  type: string;
  region: Rectangle;
  providers: string[];
  refreshOnDemand: boolean;
  options: WidgetOptions;
};

export type LayoutConfig = {
  widgets: WidgetConfig[];
};
