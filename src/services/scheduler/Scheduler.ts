import {
  Result,
  success,
  failure,
  AddJobOptions,
  JobHandler,
  ScheduleJob,
} from "@core/types";
import { IScheduler } from "@core/interfaces";
import { NotFoundError } from "@core/errors";
import { SCHEDULER_MAX_TIMER_DELAY_MS } from "@core/constants";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";

const logger = getLogger("Scheduler");

interface JobEntry {
  key: string;
  cadenceMs: number;
  handler: JobHandler;
  nextFireAt: number;
  running: boolean;
}

/**
 * Single timer loop over named periodic jobs.
 *
 * The timer is armed for the earliest `nextFireAt`. When it fires, every
 * due job is rescheduled to `now + cadence` and started, so a job delayed
 * by a long stall fires once and resumes its cadence from that moment.
 * A job whose previous run has not finished is skipped for that tick.
 *
 * @example
 * ```typescript
 * const scheduler = new Scheduler();
 * scheduler.addJob("provider:weather", 300_000, () => refreshWeather());
 * scheduler.start();
 * ```
 */
export class Scheduler implements IScheduler {
  private readonly jobs = new Map<string, JobEntry>();
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(private readonly now: () => number = Date.now) {}

  addJob(
    key: string,
    cadenceMs: number,
    handler: JobHandler,
    options: AddJobOptions = {},
  ): void {
    const now = this.now();
    this.jobs.set(key, {
      key,
      cadenceMs,
      handler,
      nextFireAt: options.immediate ? now : now + cadenceMs,
      running: false,
    });
    logger.debug(`Added job ${key} every ${cadenceMs}ms`);
    this.arm();
  }

  removeJob(key: string): boolean {
    const removed = this.jobs.delete(key);
    if (removed) {
      logger.debug(`Removed job ${key}`);
      this.arm();
    }
    return removed;
  }

  removeJobs(prefix: string): number {
    let removed = 0;
    for (const key of [...this.jobs.keys()]) {
      if (key.startsWith(prefix)) {
        this.jobs.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug(`Removed ${removed} job(s) with prefix ${prefix}`);
      this.arm();
    }
    return removed;
  }

  hasJob(key: string): boolean {
    return this.jobs.has(key);
  }

  async runNow(key: string): Promise<Result<void, NotFoundError>> {
    const job = this.jobs.get(key);
    if (!job) {
      return failure(NotFoundError.job(key));
    }
    if (job.running) {
      logger.info(`Job ${key} is already running`);
      return success(undefined);
    }
    logger.info(`Running job ${key} now`);
    await this.execute(job);
    return success(undefined);
  }

  listJobs(): ScheduleJob[] {
    return [...this.jobs.values()]
      .map((job) => ({
        key: job.key,
        cadenceMs: job.cadenceMs,
        nextFireAt: new Date(job.nextFireAt),
        running: job.running,
      }))
      .sort((a, b) => a.nextFireAt.getTime() - b.nextFireAt.getTime());
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    logger.info(`Scheduler started with ${this.jobs.size} job(s)`);
    this.arm();
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    logger.info("Scheduler stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  private arm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (!this.running || this.jobs.size === 0) {
      return;
    }

    let earliest = Infinity;
    for (const job of this.jobs.values()) {
      earliest = Math.min(earliest, job.nextFireAt);
    }
    const delay = Math.min(
      Math.max(0, earliest - this.now()),
      SCHEDULER_MAX_TIMER_DELAY_MS,
    );
    this.timer = setTimeout(() => this.tick(), delay);
  }

  private tick(): void {
    this.timer = null;
    const now = this.now();

    for (const job of this.jobs.values()) {
      if (job.nextFireAt > now) {
        continue;
      }
      job.nextFireAt = now + job.cadenceMs;
      if (job.running) {
        logger.debug(`Job ${job.key} still running, skipping tick`);
        continue;
      }
      void this.execute(job);
    }

    this.arm();
  }

  /**
   * Run a handler; failures are logged and never reach the loop
   */
  private async execute(job: JobEntry): Promise<void> {
    job.running = true;
    try {
      await job.handler();
    } catch (error) {
      logger.error(`Job ${job.key} failed: ${toError(error).message}`);
    } finally {
      job.running = false;
    }
  }
}
