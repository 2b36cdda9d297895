import { Result, success, failure, ProviderPayload } from "@core/types";
import { IDataProvider } from "@core/interfaces";
import { FetchError, FetchErrorCode } from "@core/errors";
import { getLogger } from "@utils/logger";
import { isRecord, toError } from "@utils/typeGuards";

const logger = getLogger("HttpJsonProvider");

export interface HttpJsonProviderOptions {
  url: string;
  headers?: Record<string, string>;
  /** Name of the environment variable holding a bearer token */
  credentialsRef?: string;
}

/**
 * GETs a URL and returns the parsed JSON body.
 *
 * An object body is the payload as is; arrays and scalars are wrapped
 * as `{ data: body }`.
 */
export class HttpJsonProvider implements IDataProvider {
  constructor(
    readonly name: string,
    private readonly options: HttpJsonProviderOptions,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async fetch(
    signal?: AbortSignal,
  ): Promise<Result<ProviderPayload, FetchError>> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      ...this.options.headers,
    };

    if (this.options.credentialsRef) {
      const token = this.env[this.options.credentialsRef];
      if (!token) {
        return failure(
          new FetchError(
            this.name,
            `Credential variable ${this.options.credentialsRef} is not set`,
            FetchErrorCode.AUTH,
            false,
          ),
        );
      }
      headers.Authorization = `Bearer ${token}`;
    }

    let response: Response;
    try {
      logger.debug(`${this.name}: GET ${this.options.url}`);
      response = await fetch(this.options.url, { headers, signal });
    } catch (error) {
      return failure(FetchError.network(this.name, toError(error)));
    }

    if (!response.ok) {
      return failure(
        FetchError.httpStatus(this.name, response.status, this.options.url),
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return failure(FetchError.parse(this.name, toError(error).message));
    }

    return success(isRecord(body) ? body : { data: body });
  }
}
