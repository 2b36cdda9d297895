import {
  Result,
  success,
  failure,
  ProviderPayload,
  ProviderReading,
  ProviderStatus,
  Staleness,
} from "@core/types";
import { IDataProvider } from "@core/interfaces";
import { FetchError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";

const logger = getLogger("ProviderSlot");

export interface ProviderSlotSettings {
  /** Cached data older than this is stale */
  maxAgeMs: number;
  /** Cadence of the scheduled refresh job */
  refreshIntervalMs: number;
  /** A fetch still pending after this long is abandoned */
  fetchTimeoutMs: number;
}

/**
 * Cache and fetch guard for one provider.
 *
 * The cached value is only ever replaced by a successful fetch. At most
 * one fetch runs at a time; a refresh requested while one is running
 * joins it and receives the same outcome.
 */
export class ProviderSlot {
  private cachedValue: ProviderPayload | undefined = undefined;
  private lastFetchedAt: number | undefined = undefined;
  private lastAttemptAt: number | undefined = undefined;
  private lastError: FetchError | undefined = undefined;
  private inFlight: Promise<Result<void, FetchError>> | null = null;

  constructor(
    private readonly provider: IDataProvider,
    private readonly settings: ProviderSlotSettings,
    private readonly now: () => number = Date.now,
  ) {}

  get name(): string {
    return this.provider.name;
  }

  get refreshIntervalMs(): number {
    return this.settings.refreshIntervalMs;
  }

  isFetching(): boolean {
    return this.inFlight !== null;
  }

  refresh(): Promise<Result<void, FetchError>> {
    if (this.inFlight) {
      logger.debug(`${this.name}: fetch in flight, joining`);
      return this.inFlight;
    }

    this.inFlight = this.runFetch().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  read(): ProviderReading {
    return {
      value: this.cachedValue,
      staleness: this.getStaleness(),
      fetchedAt:
        this.lastFetchedAt === undefined
          ? undefined
          : new Date(this.lastFetchedAt),
    };
  }

  getStatus(): ProviderStatus {
    return {
      name: this.name,
      staleness: this.getStaleness(),
      lastError: this.lastError ? this.lastError.message : null,
      lastFetchedAt:
        this.lastFetchedAt === undefined ? null : new Date(this.lastFetchedAt),
      lastAttemptAt:
        this.lastAttemptAt === undefined ? null : new Date(this.lastAttemptAt),
      fetching: this.isFetching(),
      maxAgeMs: this.settings.maxAgeMs,
      refreshIntervalMs: this.settings.refreshIntervalMs,
    };
  }

  private getStaleness(): Staleness {
    if (this.cachedValue === undefined || this.lastFetchedAt === undefined) {
      return "absent";
    }
    return this.now() - this.lastFetchedAt <= this.settings.maxAgeMs
      ? "fresh"
      : "stale";
  }

  private async runFetch(): Promise<Result<void, FetchError>> {
    this.lastAttemptAt = this.now();
    const outcome = await this.fetchWithTimeout();

    if (!outcome.success) {
      this.lastError = outcome.error;
      logger.warn(`${this.name}: fetch failed: ${outcome.error.message}`);
      return failure(outcome.error);
    }

    this.cachedValue = outcome.data;
    this.lastFetchedAt = this.now();
    this.lastError = undefined;
    logger.debug(`${this.name}: cache updated`);
    return success(undefined);
  }

  /**
   * Fetch bounded by the configured timeout.
   * Anything the provider throws becomes a FetchError; a result arriving
   * after the timeout is discarded.
   */
  private async fetchWithTimeout(): Promise<Result<ProviderPayload, FetchError>> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<Result<ProviderPayload, FetchError>>(
      (resolve) => {
        timer = setTimeout(() => {
          controller.abort();
          resolve(
            failure(FetchError.timeout(this.name, this.settings.fetchTimeoutMs)),
          );
        }, this.settings.fetchTimeoutMs);
      },
    );

    const attempt = Promise.resolve()
      .then(() => this.provider.fetch(controller.signal))
      .catch((error: unknown) =>
        failure(FetchError.fromThrown(this.name, toError(error))),
      );

    try {
      return await Promise.race([attempt, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
