/**
 * Payload returned by a provider fetch.
 * Shape is provider specific; widgets pick the fields they know.
 */
export type ProviderPayload = Record<string, unknown>;

/**
 * Age classification of a provider's cached value
 */
export type Staleness = "fresh" | "stale" | "absent";

/**
 * Non-blocking view of a provider's cache
 */
export type ProviderReading = {
  value: ProviderPayload | undefined;
  staleness: Staleness;
  fetchedAt: Date | undefined;
};

/**
 * Observability snapshot of a single provider slot
 */
export type ProviderStatus = {
  name: string;
  staleness: Staleness;
  lastError: string | null;
  lastFetchedAt: Date | null;
  lastAttemptAt: Date | null;
  fetching: boolean;
  maxAgeMs: number;
  refreshIntervalMs: number;
};
