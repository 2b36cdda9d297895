import { Result, HubConfig } from "@core/types";
import { ConfigError } from "@core/errors";

/**
 * Source of the hub configuration on disk
 */
export interface IConfigService {
  getConfigPath(): string;

  /**
   * Read, substitute `${VAR}` placeholders and validate
   */
  load(): Promise<Result<HubConfig, ConfigError>>;
}
