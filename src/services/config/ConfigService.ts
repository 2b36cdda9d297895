import * as fs from "fs/promises";
import {
  Result,
  HubConfig,
  LayoutDefinition,
  success,
  failure,
} from "@core/types";
import { ConfigError } from "@core/errors";
import { IConfigService } from "@core/interfaces";
import { CONFIG_DEFAULT_PATH } from "@core/constants";
import { getLogger } from "@utils/logger";
import { isNodeJSErrnoException, isRecord, toError } from "@utils/typeGuards";
import { validateConfig } from "./configSchema";

const logger = getLogger("ConfigService");

const ENV_PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Config Service Implementation
 *
 * Reads the hub configuration file, replaces `${VAR}` placeholders from the
 * environment and validates the result.
 */
export class ConfigService implements IConfigService {
  constructor(
    private readonly configPath: string = CONFIG_DEFAULT_PATH,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load and validate the configuration file
   */
  async load(): Promise<Result<HubConfig, ConfigError>> {
    const raw = await this.readConfigFile();
    if (!raw.success) {
      return raw;
    }

    const substituted = substituteEnvVars(raw.data, this.env);
    if (!substituted.success) {
      return substituted;
    }

    const result = validateConfig(substituted.data);
    if (result.success) {
      logger.info(
        `Loaded ${this.configPath}: ${Object.keys(result.data.providers).length} provider(s), ${Object.keys(result.data.layouts).length} layout(s)`,
      );
    } else {
      logger.error(result.error.message);
    }
    return result;
  }

  private async readConfigFile(): Promise<Result<unknown, ConfigError>> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, "utf-8");
    } catch (error) {
      if (isNodeJSErrnoException(error) && error.code === "ENOENT") {
        return failure(ConfigError.fileNotFound(this.configPath));
      }
      return failure(ConfigError.readError(this.configPath, toError(error)));
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return success(parsed);
    } catch (error) {
      return failure(ConfigError.invalidJSON(this.configPath, toError(error)));
    }
  }
}

/**
 * Replace `${VAR}` in every string of a parsed JSON tree.
 * The first variable missing from the environment fails the whole tree.
 */
export function substituteEnvVars(
  value: unknown,
  env: NodeJS.ProcessEnv,
): Result<unknown, ConfigError> {
  if (typeof value === "string") {
    const missing: string[] = [];
    const replaced = value.replace(ENV_PLACEHOLDER, (match, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        missing.push(name);
        return match;
      }
      return resolved;
    });
    return missing.length === 0
      ? success(replaced)
      : failure(ConfigError.missingEnvVar(missing[0]));
  }

  if (Array.isArray(value)) {
    const items: unknown[] = [];
    for (const item of value) {
      const result = substituteEnvVars(item, env);
      if (!result.success) {
        return result;
      }
      items.push(result.data);
    }
    return success(items);
  }

  if (isRecord(value)) {
    const entries: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      const result = substituteEnvVars(item, env);
      if (!result.success) {
        return result;
      }
      entries[key] = result.data;
    }
    return success(entries);
  }

  return success(value);
}

/**
 * Layout definitions keyed by name, in configuration order
 */
export function toLayoutDefinitions(
  config: HubConfig,
): Map<string, LayoutDefinition> {
  const layouts = new Map<string, LayoutDefinition>();
  for (const [name, layout] of Object.entries(config.layouts)) {
    layouts.set(name, {
      name,
      placements: layout.widgets.map((widget) => ({
        type: widget.type,
        region: { ...widget.region },
        providerBindings: [...widget.providers],
        options: widget.options,
        refreshOnDemand: widget.refreshOnDemand,
      })),
    });
  }
  return layouts;
}
