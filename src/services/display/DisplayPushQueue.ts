import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";

const logger = getLogger("DisplayPushQueue");

/**
 * Serializes pushes to the display.
 *
 * E-paper panels don't handle concurrent access well, so only one push
 * runs at a time. A request arriving meanwhile takes the single pending
 * slot, replacing whatever was waiting there (latest wins).
 */
export class DisplayPushQueue<T> {
  private pushInProgress: boolean = false;
  private pending: T | null = null;
  private drain: Promise<void> | null = null;

  constructor(private readonly handler: (item: T) => Promise<void>) {}

  /**
   * Check if a push is currently in progress
   */
  isInProgress(): boolean {
    return this.pushInProgress;
  }

  /**
   * Check if there's a pending push queued
   */
  hasPending(): boolean {
    return this.pending !== null;
  }

  getPending(): T | null {
    return this.pending;
  }

  /**
   * Start a push, or park it behind the one in progress.
   *
   * @returns true if the push started immediately, false if queued
   */
  submit(item: T): boolean {
    if (this.pushInProgress) {
      if (this.pending !== null) {
        logger.info("Replacing pending push with a newer request");
      } else {
        logger.info("Push queued, current push in progress");
      }
      this.pending = item;
      return false;
    }

    this.pushInProgress = true;
    this.drain = this.run(item);
    return true;
  }

  /**
   * Drop the pending push. The one in progress is left alone.
   */
  discardPending(): void {
    if (this.pending !== null) {
      logger.info("Discarding pending push");
      this.pending = null;
    }
  }

  /**
   * Resolves once the in-progress push and everything queued behind it is done
   */
  whenIdle(): Promise<void> {
    return this.drain ?? Promise.resolve();
  }

  private async run(first: T): Promise<void> {
    let next: T | null = first;
    try {
      while (next !== null) {
        try {
          await this.handler(next);
        } catch (error) {
          logger.error(`Display push failed: ${toError(error).message}`);
        }
        next = this.pending;
        this.pending = null;
        if (next !== null) {
          logger.info("Processing queued display push");
        }
      }
    } finally {
      this.pushInProgress = false;
      this.drain = null;
    }
  }
}
