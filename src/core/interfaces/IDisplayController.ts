import {
  Result,
  DisplayMode,
  DisplayStatus,
  RenderedFrame,
} from "@core/types";
import { NotFoundError } from "@core/errors";

/**
 * Two-mode state machine in front of the display transport
 */
export interface IDisplayController {
  getMode(): DisplayMode;

  /**
   * Enter a mode. Entering auto-rotate (re)starts rotation from the
   * first layout; entering manual cancels rotation.
   */
  setMode(mode: DisplayMode): void;

  /**
   * Show a layout. Leaves auto-rotate first.
   * Resolves once the request is accepted, not when the push completes.
   */
  displayLayout(name: string): Result<void, NotFoundError>;

  /**
   * Advance rotation and show the next layout.
   * Ignored outside auto-rotate and during quiet hours.
   */
  rotationTick(): Promise<void>;

  getStatus(): DisplayStatus;

  /**
   * Last frame produced, delivered or not
   */
  getPreviewFrame(): RenderedFrame | null;

  /**
   * Resolves when no render or push is outstanding
   */
  whenIdle(): Promise<void>;

  /**
   * Cancel rotation and drop pending work. The in-flight push finishes.
   */
  stop(): Promise<void>;
}
