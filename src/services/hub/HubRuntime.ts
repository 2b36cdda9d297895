import {
  ILayoutResolver,
  ILayoutSource,
  IWidgetCatalog,
} from "@core/interfaces";
import {
  HubConfig,
  LayoutDefinition,
  QuietHours,
  RenderedFrame,
} from "@core/types";
import { toLayoutDefinitions } from "@services/config/ConfigService";
import { LayoutResolver } from "@services/layout/LayoutResolver";
import { ProviderRegistry } from "@services/providers/ProviderRegistry";
import { createProviderRegistry } from "@services/providers/providerFactory";

/**
 * Everything derived from one validated configuration.
 * A reload builds a new runtime and swaps it in whole.
 */
export class HubRuntime implements ILayoutSource {
  private constructor(
    readonly config: HubConfig,
    readonly registry: ProviderRegistry,
    private readonly resolver: ILayoutResolver,
    private readonly layouts: Map<string, LayoutDefinition>,
  ) {}

  static fromConfig(
    config: HubConfig,
    catalog: IWidgetCatalog,
    env: NodeJS.ProcessEnv = process.env,
    now: () => Date = () => new Date(),
  ): HubRuntime {
    const registry = createProviderRegistry(
      config.providers,
      () => now().getTime(),
      env,
    );
    const resolver = new LayoutResolver(
      registry,
      catalog,
      { width: config.display.width, height: config.display.height },
      now,
    );
    return new HubRuntime(
      config,
      registry,
      resolver,
      toLayoutDefinitions(config),
    );
  }

  listLayouts(): string[] {
    return [...this.layouts.keys()];
  }

  getLayout(name: string): LayoutDefinition | undefined {
    return this.layouts.get(name);
  }

  getRotationSequence(): string[] {
    return this.config.schedule.layoutSequence;
  }

  getRotationIntervalMs(): number {
    return this.config.schedule.rotationIntervalSeconds * 1000;
  }

  getQuietHours(): QuietHours | undefined {
    return this.config.schedule.quietHours;
  }

  resolve(layout: LayoutDefinition): Promise<RenderedFrame> {
    return this.resolver.resolve(layout);
  }
}
