import { LayoutDefinition, RenderedFrame, QuietHours } from "@core/types";

/**
 * What the display controller needs from the active configuration.
 * Backed by the hub's current runtime, so a config reload takes effect
 * on the next request without rebuilding the controller.
 */
export interface ILayoutSource {
  getLayout(name: string): LayoutDefinition | undefined;

  getRotationSequence(): string[];

  /**
   * Rotation interval in milliseconds
   */
  getRotationIntervalMs(): number;

  getQuietHours(): QuietHours | undefined;

  resolve(layout: LayoutDefinition): Promise<RenderedFrame>;
}
