/**
 * Work executed when a job fires
 */
export type JobHandler = () => Promise<void>;

/**
 * Public view of a scheduled job
 */
export type ScheduleJob = {
  key: string;
  cadenceMs: number;
  nextFireAt: Date;
  running: boolean;
};

export type AddJobOptions = {
  /** Fire on the next loop turn instead of one cadence from now */
  immediate?: boolean;
};

/**
 * Daily window during which rotation is suspended, as HH:MM strings.
 * A start later than the end spans midnight.
 */
export type QuietHours = {
  start: string;
  end: string;
};
