import { IDisplayTransport } from "@core/interfaces";
import { Result, Bitmap1Bit, success, failure } from "@core/types";
import { TransportError } from "@core/errors";
import { MOCK_DISPLAY_HISTORY_LIMIT } from "@core/constants";
import { BitmapUtils } from "@services/bitmap/BitmapUtils";
import { getLogger } from "@utils/logger";

const logger = getLogger("MockDisplayTransport");

/**
 * In-memory display for development and testing.
 *
 * Simulates the push latency of an e-paper panel, rejects concurrent pushes
 * the way busy hardware would, and keeps copies of the most recent
 * accepted bitmaps.
 */
export class MockDisplayTransport implements IDisplayTransport {
  private busy = false;
  private readonly recent: Bitmap1Bit[] = [];
  private pushCount = 0;
  private lastPushAt: Date | null = null;

  constructor(
    readonly width: number,
    readonly height: number,
    private readonly latencyMs: number = 0,
    private readonly historyLimit: number = MOCK_DISPLAY_HISTORY_LIMIT,
  ) {
    logger.info(
      `Mock display created: ${width}x${height}, ${latencyMs}ms per push`,
    );
  }

  async push(bitmap: Bitmap1Bit): Promise<Result<void, TransportError>> {
    if (bitmap.width !== this.width || bitmap.height !== this.height) {
      return failure(
        TransportError.sizeMismatch(
          bitmap.width,
          bitmap.height,
          this.width,
          this.height,
        ),
      );
    }

    if (this.busy) {
      return failure(TransportError.busy());
    }

    try {
      this.busy = true;
      logger.info(
        `Mock display: pushing bitmap (${bitmap.width}x${bitmap.height}, ${bitmap.data.length} bytes)`,
      );

      if (this.latencyMs > 0) {
        await this.delay(this.latencyMs);
      }

      this.recent.push(BitmapUtils.clone(bitmap));
      if (this.recent.length > this.historyLimit) {
        this.recent.shift();
      }
      this.pushCount++;
      this.lastPushAt = new Date();
      logger.info("Mock display: bitmap displayed");
      return success(undefined);
    } finally {
      this.busy = false;
    }
  }

  isBusy(): boolean {
    return this.busy;
  }

  /**
   * Accepted pushes since creation
   */
  getPushCount(): number {
    return this.pushCount;
  }

  /**
   * Copies of the most recent accepted bitmaps, oldest first
   */
  getRecentBitmaps(): Bitmap1Bit[] {
    return [...this.recent];
  }

  getLastBitmap(): Bitmap1Bit | null {
    return this.recent.length > 0 ? this.recent[this.recent.length - 1] : null;
  }

  getLastPushAt(): Date | null {
    return this.lastPushAt;
  }

  /**
   * Simulate async delay
   */
  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
