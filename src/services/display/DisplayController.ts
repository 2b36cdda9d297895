import {
  IDisplayController,
  IDisplayTransport,
  ILayoutSource,
  IScheduler,
} from "@core/interfaces";
import {
  Result,
  success,
  failure,
  DisplayMode,
  DisplayStatus,
  DeliveryRecord,
  LayoutDefinition,
  RenderedFrame,
} from "@core/types";
import { NotFoundError, TransportError } from "@core/errors";
import { ROTATION_JOB_KEY } from "@core/constants";
import { isWithinQuietHours } from "@services/scheduler/quietHours";
import { getLogger } from "@utils/logger";
import { extractErrorInfo, toError } from "@utils/typeGuards";
import { DisplayPushQueue } from "./DisplayPushQueue";

const logger = getLogger("DisplayController");

/**
 * Decides what the display shows.
 *
 * Every request gets a sequence number. Rendering runs first; a frame
 * whose request was superseded while it rendered is dropped. Surviving
 * frames go through a latest-wins push queue, so at most one push is in
 * flight and at most one waits behind it. Mode changes bump the sequence
 * and clear the waiting slot but never abort the push in flight.
 */
export class DisplayController implements IDisplayController {
  private mode: DisplayMode = DisplayMode.MANUAL;
  private requestSeq = 0;
  private rotationIndex = 0;
  private currentLayout: string | null = null;
  private lastDelivery: DeliveryRecord | null = null;
  private lastFrame: RenderedFrame | null = null;
  private deliveredCount = 0;
  private failedCount = 0;
  private readonly renders = new Set<Promise<void>>();
  private readonly queue: DisplayPushQueue<RenderedFrame>;

  constructor(
    private readonly transport: IDisplayTransport,
    private readonly scheduler: IScheduler,
    private readonly layouts: ILayoutSource,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.queue = new DisplayPushQueue((frame) => this.deliver(frame));
  }

  getMode(): DisplayMode {
    return this.mode;
  }

  setMode(mode: DisplayMode): void {
    this.requestSeq++;
    this.queue.discardPending();
    this.scheduler.removeJob(ROTATION_JOB_KEY);

    if (mode === DisplayMode.AUTO_ROTATE) {
      this.rotationIndex = 0;
      this.scheduler.addJob(
        ROTATION_JOB_KEY,
        this.layouts.getRotationIntervalMs(),
        () => this.rotationTick(),
        { immediate: true },
      );
    }

    if (this.mode !== mode) {
      logger.info(`Display mode: ${this.mode} -> ${mode}`);
    } else {
      logger.info(`Display mode ${mode} restarted`);
    }
    this.mode = mode;
  }

  displayLayout(name: string): Result<void, NotFoundError> {
    const layout = this.layouts.getLayout(name);
    if (!layout) {
      return failure(NotFoundError.layout(name));
    }

    if (this.mode === DisplayMode.AUTO_ROTATE) {
      this.setMode(DisplayMode.MANUAL);
    }

    logger.info(`Manual display of ${name}`);
    void this.request(layout);
    return success(undefined);
  }

  async rotationTick(): Promise<void> {
    if (this.mode !== DisplayMode.AUTO_ROTATE) {
      return;
    }

    if (isWithinQuietHours(this.layouts.getQuietHours(), this.now())) {
      logger.debug("Quiet hours, skipping rotation");
      return;
    }

    const sequence = this.layouts.getRotationSequence();
    if (sequence.length === 0) {
      logger.warn("Rotation sequence is empty");
      return;
    }

    this.rotationIndex = (this.rotationIndex + 1) % sequence.length;
    const name = sequence[this.rotationIndex];
    const layout = this.layouts.getLayout(name);
    if (!layout) {
      logger.warn(`Rotation layout ${name} no longer exists`);
      return;
    }

    logger.info(
      `Rotating to ${name} (${this.rotationIndex + 1}/${sequence.length})`,
    );
    await this.request(layout);
  }

  getStatus(): DisplayStatus {
    const pending = this.queue.getPending();
    return {
      mode: this.mode,
      currentLayout: this.currentLayout,
      lastDelivery: this.lastDelivery,
      pushInFlight: this.queue.isInProgress(),
      pendingLayout: pending ? pending.layoutName : null,
      rotationIndex: this.rotationIndex,
      deliveredCount: this.deliveredCount,
      failedCount: this.failedCount,
    };
  }

  getPreviewFrame(): RenderedFrame | null {
    return this.lastFrame;
  }

  async whenIdle(): Promise<void> {
    while (this.renders.size > 0 || this.queue.isInProgress()) {
      await Promise.all([...this.renders]);
      await this.queue.whenIdle();
    }
  }

  async stop(): Promise<void> {
    this.scheduler.removeJob(ROTATION_JOB_KEY);
    this.requestSeq++;
    this.queue.discardPending();
    await this.whenIdle();
    logger.info("Display controller stopped");
  }

  /**
   * Render a layout and hand the frame to the push queue.
   * Resolves once the frame is queued or dropped, not when it is pushed.
   */
  private request(layout: LayoutDefinition): Promise<void> {
    const seq = ++this.requestSeq;
    const render: Promise<void> = this.renderAndSubmit(seq, layout).finally(
      () => {
        this.renders.delete(render);
      },
    );
    this.renders.add(render);
    return render;
  }

  private async renderAndSubmit(
    seq: number,
    layout: LayoutDefinition,
  ): Promise<void> {
    let frame: RenderedFrame;
    try {
      frame = await this.layouts.resolve(layout);
    } catch (error) {
      logger.error(`Rendering ${layout.name} failed:`, toError(error));
      return;
    }

    if (seq !== this.requestSeq) {
      logger.info(`Dropping superseded frame for ${layout.name}`);
      return;
    }

    this.lastFrame = frame;
    this.queue.submit(frame);
  }

  private async deliver(frame: RenderedFrame): Promise<void> {
    const attemptedAt = this.now();

    let result: Result<void, TransportError>;
    try {
      result = await this.transport.push(frame.image);
    } catch (error) {
      result = failure(TransportError.pushFailed(toError(error)));
    }

    if (result.success) {
      this.currentLayout = frame.layoutName;
      this.deliveredCount++;
      this.lastDelivery = {
        layoutName: frame.layoutName,
        producedAt: frame.producedAt,
        attemptedAt,
        delivered: true,
        degraded: frame.degraded,
      };
      logger.info(
        `Delivered ${frame.layoutName}${frame.degraded ? " (degraded)" : ""}`,
      );
      return;
    }

    this.failedCount++;
    const { code, message } = extractErrorInfo(result.error);
    this.lastDelivery = {
      layoutName: frame.layoutName,
      producedAt: frame.producedAt,
      attemptedAt,
      delivered: false,
      degraded: frame.degraded,
      error: result.error.message,
      errorCode: code,
      userMessage: message,
    };
    logger.error(`Push of ${frame.layoutName} failed: ${result.error.message}`);
  }
}
