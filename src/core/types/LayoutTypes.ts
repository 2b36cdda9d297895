import { Bitmap1Bit, Rectangle } from "./DisplayTypes";
import { ProviderPayload, Staleness } from "./ProviderTypes";

/**
 * Free-form widget options from configuration
 */
export type WidgetOptions = Record<string, unknown>;

/**
 * One widget placed on a layout
 */
export type WidgetPlacement = {
  /** Widget type name, looked up in the widget catalog */
  type: string;

  /** Where the widget is drawn on the canvas */
  region: Rectangle;

  /** Providers whose data the widget receives, in order */
  providerBindings: string[];

  options: WidgetOptions;

  /** Refresh stale or absent bindings once before rendering */
  refreshOnDemand: boolean;
};

export type LayoutDefinition = {
  name: string;
  placements: WidgetPlacement[];
};

/**
 * Data handed to a widget for one binding
 */
export type BoundData = {
  provider: string;
  value: ProviderPayload | undefined;
  staleness: Staleness;
};

/**
 * Ambient inputs a widget may need besides provider data
 */
export type RenderContext = {
  now: Date;
};

/**
 * What a widget produces for its region
 */
export type WidgetOutput = {
  /** Region-sized bitmap */
  pixels: Bitmap1Bit;
  usedFallback: boolean;
};

export type PlacementOutcome = "ok" | "stale" | "fallback" | "error";

export type PlacementReport = {
  type: string;
  region: Rectangle;
  outcome: PlacementOutcome;
  error?: string;
};

/**
 * A composed full-canvas image. Never mutated after it is produced.
 */
export type RenderedFrame = {
  readonly layoutName: string;
  readonly image: Bitmap1Bit;
  readonly producedAt: Date;
  readonly degraded: boolean;
  readonly placements: readonly PlacementReport[];
};
