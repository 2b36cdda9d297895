import {
  Result,
  success,
  failure,
  BoundData,
  Rectangle,
  RenderContext,
  WidgetOptions,
  WidgetOutput,
} from "@core/types";
import { IWidget, IWidgetCatalog } from "@core/interfaces";
import { RenderError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";
import { ClockWidget } from "./ClockWidget";
import { ListWidget } from "./ListWidget";
import { TextWidget } from "./TextWidget";
import { ValueWidget } from "./ValueWidget";

const logger = getLogger("WidgetCatalog");

export function createBuiltinWidgets(): IWidget[] {
  return [
    new TextWidget(),
    new ClockWidget(),
    new ValueWidget(),
    new ListWidget(),
  ];
}

/**
 * Static table of widget types, fixed at construction
 */
export class WidgetCatalog implements IWidgetCatalog {
  private readonly widgets: ReadonlyMap<string, IWidget>;

  constructor(widgets: IWidget[] = createBuiltinWidgets()) {
    this.widgets = new Map(widgets.map((widget) => [widget.type, widget]));
  }

  has(type: string): boolean {
    return this.widgets.has(type);
  }

  types(): string[] {
    return [...this.widgets.keys()];
  }

  render(
    type: string,
    region: Rectangle,
    data: BoundData[],
    options: WidgetOptions,
    context: RenderContext,
  ): Result<WidgetOutput, RenderError> {
    const widget = this.widgets.get(type);
    if (!widget) {
      return failure(RenderError.unknownWidget(type));
    }

    try {
      return success(widget.render(region, data, options, context));
    } catch (error) {
      const renderError = RenderError.widgetFailed(type, toError(error));
      logger.error(renderError.message);
      return failure(renderError);
    }
  }
}
