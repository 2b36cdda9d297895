import {
  Result,
  JobHandler,
  ScheduleJob,
  AddJobOptions,
} from "@core/types";
import { NotFoundError } from "@core/errors";

/**
 * One timer loop over named periodic jobs
 */
export interface IScheduler {
  /**
   * Add or replace a job.
   * It first fires after one cadence, or on the next loop turn with `immediate`.
   */
  addJob(
    key: string,
    cadenceMs: number,
    handler: JobHandler,
    options?: AddJobOptions,
  ): void;

  /**
   * @returns true if a job was removed
   */
  removeJob(key: string): boolean;

  /**
   * Remove every job whose key starts with the prefix
   * @returns number of jobs removed
   */
  removeJobs(prefix: string): number;

  hasJob(key: string): boolean;

  /**
   * Run a job immediately without moving its next fire time.
   * Does nothing if its previous run is still pending.
   */
  runNow(key: string): Promise<Result<void, NotFoundError>>;

  listJobs(): ScheduleJob[];

  start(): void;

  stop(): void;

  isRunning(): boolean;
}
