import {
  Result,
  DisplayMode,
  DisplayStatus,
  ProviderStatus,
  ScheduleJob,
} from "@core/types";
import { ConfigError, NotFoundError } from "@core/errors";

export type HubStatus = {
  mode: DisplayMode;
  currentLayout: string | null;
  providerStatuses: ProviderStatus[];
  display: DisplayStatus;
};

/**
 * Operations exposed to an operator front end
 */
export interface IHubService {
  start(): Promise<void>;

  stop(): Promise<void>;

  getStatus(): HubStatus;

  listLayouts(): string[];

  triggerDisplay(layoutName: string): Result<void, NotFoundError>;

  /**
   * Accepts "manual" or "auto_rotate"
   */
  setMode(mode: string): Result<void, ConfigError>;

  /**
   * Schedules an immediate refresh; does not wait for it
   */
  refreshProvider(name: string): Result<void, NotFoundError>;

  listJobs(): ScheduleJob[];

  /**
   * Substitute `${VAR}` placeholders, validate a raw configuration tree
   * and swap it in. On failure the active configuration is untouched.
   */
  reloadConfig(raw: unknown): Result<void, ConfigError>;

  /**
   * Re-read the configuration file and swap it in, as `reloadConfig`
   */
  reloadFromFile(): Promise<Result<void, ConfigError>>;

  /**
   * Last frame as PNG
   */
  getPreview(): Promise<Result<Buffer, NotFoundError>>;
}
