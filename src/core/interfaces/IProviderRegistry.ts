import { Result, ProviderReading, ProviderStatus } from "@core/types";
import { FetchError, NotFoundError } from "@core/errors";

/**
 * Name to provider slot mapping.
 * The only path by which other components read provider data.
 */
export interface IProviderRegistry {
  /**
   * Refresh one provider.
   * Joins the in-flight fetch when there is one, so concurrent calls
   * issue a single fetch and share its outcome.
   */
  refresh(name: string): Promise<Result<void, FetchError | NotFoundError>>;

  /**
   * Refresh every provider concurrently.
   * Failures are logged per provider and never abort the others.
   */
  refreshAll(): Promise<void>;

  /**
   * Current cached value and its staleness. Never fetches.
   * Undefined for an unknown provider.
   */
  read(name: string): ProviderReading | undefined;

  has(name: string): boolean;

  names(): string[];

  listStatus(): ProviderStatus[];
}
