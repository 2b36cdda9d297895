import { Result, success, ProviderPayload } from "@core/types";
import { IDataProvider } from "@core/interfaces";
import { FetchError } from "@core/errors";

/**
 * Returns a fixed payload from configuration.
 * Useful for labels, notes and trying layouts without network access.
 */
export class StaticProvider implements IDataProvider {
  constructor(
    readonly name: string,
    private readonly payload: ProviderPayload,
  ) {}

  async fetch(): Promise<Result<ProviderPayload, FetchError>> {
    return success({ ...this.payload });
  }
}
