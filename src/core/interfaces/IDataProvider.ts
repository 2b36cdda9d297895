import { Result, ProviderPayload } from "@core/types";
import { FetchError } from "@core/errors";

/**
 * A fetch capability for one external data source.
 *
 * Implementations return failures as FetchError. The registry also
 * converts anything they throw, so a misbehaving provider cannot
 * affect other providers.
 */
export interface IDataProvider {
  /**
   * Provider name as configured
   */
  readonly name: string;

  /**
   * @param signal aborted when the caller stops waiting for the result
   */
  fetch(signal?: AbortSignal): Promise<Result<ProviderPayload, FetchError>>;
}
