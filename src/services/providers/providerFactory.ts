import { ProviderConfig } from "@core/types";
import { IDataProvider } from "@core/interfaces";
import { getLogger } from "@utils/logger";
import { isRecord } from "@utils/typeGuards";
import { HttpJsonProvider } from "./HttpJsonProvider";
import { ProviderRegistry } from "./ProviderRegistry";
import { ProviderSlot } from "./ProviderSlot";
import { StaticProvider } from "./StaticProvider";

const logger = getLogger("ProviderFactory");

/**
 * Build the fetch capability for one configured provider.
 * The config schema guarantees the options each kind needs.
 */
export function createProvider(
  name: string,
  config: ProviderConfig,
  env: NodeJS.ProcessEnv = process.env,
): IDataProvider {
  switch (config.kind) {
    case "static": {
      const payload = config.options.payload;
      return new StaticProvider(name, isRecord(payload) ? payload : {});
    }
    case "http_json": {
      const url = config.options.url;
      return new HttpJsonProvider(
        name,
        {
          url: typeof url === "string" ? url : "",
          headers: stringRecord(config.options.headers),
          credentialsRef: config.credentialsRef,
        },
        env,
      );
    }
  }
}

/**
 * Build a registry holding one slot per enabled provider
 */
export function createProviderRegistry(
  providers: Record<string, ProviderConfig>,
  now: () => number = Date.now,
  env: NodeJS.ProcessEnv = process.env,
): ProviderRegistry {
  const slots: ProviderSlot[] = [];

  for (const [name, config] of Object.entries(providers)) {
    if (!config.enabled) {
      logger.info(`Provider ${name} is disabled`);
      continue;
    }
    slots.push(
      new ProviderSlot(
        createProvider(name, config, env),
        {
          maxAgeMs: config.maxAgeSeconds * 1000,
          refreshIntervalMs: config.refreshIntervalSeconds * 1000,
          fetchTimeoutMs: config.fetchTimeoutSeconds * 1000,
        },
        now,
      ),
    );
  }

  logger.info(`Created ${slots.length} provider slot(s)`);
  return new ProviderRegistry(slots);
}

function stringRecord(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") {
      result[key] = entry;
    }
  }
  return result;
}
