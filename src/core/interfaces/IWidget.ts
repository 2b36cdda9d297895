import {
  Result,
  Rectangle,
  BoundData,
  WidgetOptions,
  RenderContext,
  WidgetOutput,
} from "@core/types";
import { RenderError } from "@core/errors";

/**
 * A pure rendering capability.
 *
 * Draws into a bitmap the size of `region`. Absent data is drawn as a
 * placeholder and reported with `usedFallback`, never thrown.
 */
export interface IWidget {
  readonly type: string;

  render(
    region: Rectangle,
    data: BoundData[],
    options: WidgetOptions,
    context: RenderContext,
  ): WidgetOutput;
}

/**
 * Static table of widget types
 */
export interface IWidgetCatalog {
  has(type: string): boolean;

  types(): string[];

  /**
   * Render a placement. An unknown type is a RenderError.
   */
  render(
    type: string,
    region: Rectangle,
    data: BoundData[],
    options: WidgetOptions,
    context: RenderContext,
  ): Result<WidgetOutput, RenderError>;
}
