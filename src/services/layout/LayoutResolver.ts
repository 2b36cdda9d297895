import {
  Bitmap1Bit,
  BoundData,
  LayoutDefinition,
  PlacementReport,
  RenderContext,
  RenderedFrame,
  WidgetPlacement,
} from "@core/types";
import {
  ILayoutResolver,
  IProviderRegistry,
  IWidgetCatalog,
} from "@core/interfaces";
import { RenderError } from "@core/errors";
import { BitmapUtils } from "@services/bitmap/BitmapUtils";
import { renderErrorPlaceholder } from "@services/widgets/widgetHelpers";
import { getLogger } from "@utils/logger";

const logger = getLogger("LayoutResolver");

export interface CanvasSize {
  width: number;
  height: number;
}

/**
 * Gathers provider data for each placement, renders it through the widget
 * catalog and composites the results onto one canvas.
 *
 * Placements are independent: a missing provider, an unknown widget type
 * or a failing widget only affects its own region and marks the frame
 * degraded.
 */
export class LayoutResolver implements ILayoutResolver {
  constructor(
    private readonly registry: IProviderRegistry,
    private readonly catalog: IWidgetCatalog,
    private readonly canvas: CanvasSize,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async resolve(layout: LayoutDefinition): Promise<RenderedFrame> {
    logger.time(`resolve:${layout.name}`);
    const image = BitmapUtils.createBlankBitmap(
      this.canvas.width,
      this.canvas.height,
    );
    const context: RenderContext = { now: this.now() };
    const placements: PlacementReport[] = [];

    for (const placement of layout.placements) {
      placements.push(await this.renderPlacement(image, placement, context));
    }

    const degraded = placements.some((report) => report.outcome !== "ok");
    if (degraded) {
      const summary = placements
        .filter((report) => report.outcome !== "ok")
        .map((report) => `${report.type}=${report.outcome}`)
        .join(", ");
      logger.warn(`Layout ${layout.name} rendered degraded: ${summary}`);
    }
    logger.timeEnd(`resolve:${layout.name}`);

    return Object.freeze({
      layoutName: layout.name,
      image,
      producedAt: this.now(),
      degraded,
      placements: Object.freeze(placements),
    });
  }

  private async renderPlacement(
    image: Bitmap1Bit,
    placement: WidgetPlacement,
    context: RenderContext,
  ): Promise<PlacementReport> {
    const { type, region } = placement;

    const unknown = placement.providerBindings.find(
      (name) => !this.registry.has(name),
    );
    if (unknown !== undefined) {
      const error = RenderError.unknownProvider(type, unknown);
      logger.error(error.message);
      this.drawError(image, placement);
      return { type, region, outcome: "error", error: error.message };
    }

    const data = await this.gather(placement);
    const rendered = this.catalog.render(
      type,
      region,
      data,
      placement.options,
      context,
    );

    if (!rendered.success) {
      logger.error(rendered.error.message);
      this.drawError(image, placement);
      return { type, region, outcome: "error", error: rendered.error.message };
    }

    BitmapUtils.blit(image, rendered.data.pixels, region.x, region.y);

    if (rendered.data.usedFallback) {
      return { type, region, outcome: "fallback" };
    }
    if (data.some((bound) => bound.staleness !== "fresh")) {
      return { type, region, outcome: "stale" };
    }
    return { type, region, outcome: "ok" };
  }

  private drawError(image: Bitmap1Bit, placement: WidgetPlacement): void {
    const { region } = placement;
    const pixels = renderErrorPlaceholder(region, placement.type);
    BitmapUtils.blit(image, pixels, region.x, region.y);
  }

  /**
   * Read every binding, refreshing stale or absent ones once when the
   * placement asks for it. A second miss is accepted as is.
   */
  private async gather(placement: WidgetPlacement): Promise<BoundData[]> {
    return Promise.all(
      placement.providerBindings.map(async (name) => {
        let reading = this.registry.read(name);

        if (
          placement.refreshOnDemand &&
          reading !== undefined &&
          reading.staleness !== "fresh"
        ) {
          logger.debug(`${name} is ${reading.staleness}, refreshing on demand`);
          await this.registry.refresh(name);
          reading = this.registry.read(name);
        }

        return {
          provider: name,
          value: reading?.value,
          staleness: reading?.staleness ?? "absent",
        };
      }),
    );
  }
}
