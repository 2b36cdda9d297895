import { BaseError } from "./BaseError";

export enum RenderErrorCode {
  UNKNOWN_WIDGET = "RENDER_UNKNOWN_WIDGET",
  UNKNOWN_PROVIDER = "RENDER_UNKNOWN_PROVIDER",
  WIDGET_FAILED = "RENDER_WIDGET_FAILED",
  UNKNOWN = "RENDER_UNKNOWN_ERROR",
}

/**
 * A single placement could not be rendered. The frame is still produced.
 */
export class RenderError extends BaseError {
  constructor(
    message: string,
    code: RenderErrorCode = RenderErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
  ) {
    super(message, code, false, context);
  }

  static unknownWidget(type: string): RenderError {
    return new RenderError(
      `Unknown widget type: ${type}`,
      RenderErrorCode.UNKNOWN_WIDGET,
      { type },
    );
  }

  static unknownProvider(type: string, provider: string): RenderError {
    return new RenderError(
      `Widget '${type}' is bound to unknown provider: ${provider}`,
      RenderErrorCode.UNKNOWN_PROVIDER,
      { type, provider },
    );
  }

  static widgetFailed(type: string, error: Error): RenderError {
    return new RenderError(
      `Widget '${type}' failed: ${error.message}`,
      RenderErrorCode.WIDGET_FAILED,
      { type, originalError: error.message },
    );
  }
}
