import { LayoutDefinition, RenderedFrame } from "@core/types";

/**
 * Turns a layout definition into a full-canvas frame
 */
export interface ILayoutResolver {
  /**
   * Always produces a frame for a valid definition.
   * Missing data and failing placements only mark the frame degraded.
   */
  resolve(layout: LayoutDefinition): Promise<RenderedFrame>;
}
