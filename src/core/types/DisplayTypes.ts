/**
 * 1-bit bitmap for e-paper display.
 *
 * Pixels are packed 8 per byte, most significant bit first, rows padded to
 * a whole byte. A set bit is white, a cleared bit is black.
 */
export type Bitmap1Bit = {
  /** Width in pixels */
  width: number;

  /** Height in pixels */
  height: number;

  /** Raw bitmap data (1 bit per pixel, packed into bytes) */
  data: Uint8Array;
};

/**
 * Rectangle in pixel coordinates
 */
export type Rectangle = {
  /** X coordinate of top-left corner */
  x: number;

  /** Y coordinate of top-left corner */
  y: number;

  /** Width in pixels */
  width: number;

  /** Height in pixels */
  height: number;
};

/**
 * Display operating mode.
 *
 * In manual mode the display only changes on explicit commands; in
 * auto-rotate mode the rotation job cycles through the layout sequence.
 */
export enum DisplayMode {
  MANUAL = "manual",
  AUTO_ROTATE = "auto_rotate",
}

/**
 * Outcome of the last push to the display transport
 */
export type DeliveryRecord = {
  layoutName: string;
  producedAt: Date;
  attemptedAt: Date;
  delivered: boolean;
  degraded: boolean;
  error?: string;

  /** Error code of a failed push */
  errorCode?: string;

  /** Operator-facing text for a failed push */
  userMessage?: string;
};

/**
 * Snapshot of the display controller
 */
export type DisplayStatus = {
  mode: DisplayMode;

  /** Layout of the last frame the transport accepted */
  currentLayout: string | null;

  /** Most recent push attempt, delivered or not */
  lastDelivery: DeliveryRecord | null;

  pushInFlight: boolean;

  /** Layout waiting behind the in-flight push, if any */
  pendingLayout: string | null;

  rotationIndex: number;
  deliveredCount: number;
  failedCount: number;
};
