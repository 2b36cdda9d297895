import {
  IConfigService,
  IDisplayController,
  IDisplayTransport,
  IHubService,
  HubStatus,
  ILayoutSource,
  IScheduler,
  IWidgetCatalog,
} from "@core/interfaces";
import {
  Result,
  DisplayMode,
  HubConfig,
  ScheduleJob,
  success,
  failure,
} from "@core/types";
import { ConfigError, NotFoundError } from "@core/errors";
import { CONFIG_DEFAULT_PATH, PROVIDER_JOB_PREFIX } from "@core/constants";
import {
  ConfigService,
  substituteEnvVars,
} from "@services/config/ConfigService";
import { validateConfig } from "@services/config/configSchema";
import { DisplayController } from "@services/display/DisplayController";
import { bitmapToPng } from "@services/display/FramePreview";
import { Scheduler } from "@services/scheduler/Scheduler";
import { WidgetCatalog } from "@services/widgets/WidgetCatalog";
import { getLogger } from "@utils/logger";
import { isDisplayMode } from "@utils/typeGuards";
import { HubRuntime } from "./HubRuntime";

const logger = getLogger("HubService");

export type HubServiceDependencies = {
  transport: IDisplayTransport;
  scheduler?: IScheduler;
  catalog?: IWidgetCatalog;
  /** Used by `reloadFromFile` */
  configService?: IConfigService;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
};

/**
 * Hub Service Implementation
 *
 * The operator-facing surface of the hub. Owns the active runtime
 * (providers, resolver, layouts) and wires it to the scheduler and the
 * display controller.
 *
 * @example
 * ```typescript
 * const hub = new HubService(config, { transport });
 * await hub.start();
 * hub.triggerDisplay("home");
 * ```
 */
export class HubService implements IHubService {
  private runtime: HubRuntime;
  private started = false;
  private modeChosen = false;
  private readonly scheduler: IScheduler;
  private readonly catalog: IWidgetCatalog;
  private readonly env: NodeJS.ProcessEnv;
  private readonly configService: IConfigService;
  private readonly now: () => Date;
  private readonly controller: IDisplayController;

  constructor(config: HubConfig, deps: HubServiceDependencies) {
    this.now = deps.now ?? (() => new Date());
    this.scheduler =
      deps.scheduler ?? new Scheduler(() => this.now().getTime());
    this.catalog = deps.catalog ?? new WidgetCatalog();
    this.env = deps.env ?? process.env;
    this.configService =
      deps.configService ?? new ConfigService(CONFIG_DEFAULT_PATH, this.env);
    this.runtime = HubRuntime.fromConfig(
      config,
      this.catalog,
      this.env,
      this.now,
    );

    // Always reads through the current runtime, so a reload takes effect
    // on the next request.
    const layoutSource: ILayoutSource = {
      getLayout: (name) => this.runtime.getLayout(name),
      getRotationSequence: () => this.runtime.getRotationSequence(),
      getRotationIntervalMs: () => this.runtime.getRotationIntervalMs(),
      getQuietHours: () => this.runtime.getQuietHours(),
      resolve: (layout) => this.runtime.resolve(layout),
    };
    this.controller = new DisplayController(
      deps.transport,
      this.scheduler,
      layoutSource,
      this.now,
    );

    this.scheduleProviderJobs(this.runtime, false);
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    logger.info("Starting hub...");

    await this.runtime.registry.refreshAll();
    this.scheduler.start();
    // A mode chosen before start wins over the configured one
    if (!this.modeChosen) {
      this.controller.setMode(this.runtime.config.schedule.mode);
    }
    this.started = true;

    logger.info(
      `Hub started in ${this.controller.getMode()} mode with ${this.runtime.listLayouts().length} layout(s)`,
    );
  }

  async stop(): Promise<void> {
    logger.info("Stopping hub...");
    this.scheduler.stop();
    await this.controller.stop();
    this.started = false;
    logger.info("Hub stopped");
  }

  getStatus(): HubStatus {
    const display = this.controller.getStatus();
    return {
      mode: display.mode,
      currentLayout: display.currentLayout,
      providerStatuses: this.runtime.registry.listStatus(),
      display,
    };
  }

  listLayouts(): string[] {
    return this.runtime.listLayouts();
  }

  triggerDisplay(layoutName: string): Result<void, NotFoundError> {
    return this.controller.displayLayout(layoutName);
  }

  setMode(mode: string): Result<void, ConfigError> {
    if (!isDisplayMode(mode)) {
      return failure(
        ConfigError.invalidValue("mode", mode, "manual or auto_rotate"),
      );
    }
    if (
      mode === DisplayMode.AUTO_ROTATE &&
      this.runtime.getRotationSequence().length === 0
    ) {
      return failure(
        ConfigError.invalidValue(
          "schedule.layoutSequence",
          "[]",
          "at least one layout to auto-rotate",
        ),
      );
    }

    this.controller.setMode(mode);
    this.modeChosen = true;
    return success(undefined);
  }

  refreshProvider(name: string): Result<void, NotFoundError> {
    const key = PROVIDER_JOB_PREFIX + name;
    if (!this.scheduler.hasJob(key)) {
      return failure(NotFoundError.provider(name));
    }
    void this.scheduler.runNow(key);
    return success(undefined);
  }

  listJobs(): ScheduleJob[] {
    return this.scheduler.listJobs();
  }

  reloadConfig(raw: unknown): Result<void, ConfigError> {
    const substituted = substituteEnvVars(raw, this.env);
    if (!substituted.success) {
      return this.rejectReload(substituted.error);
    }
    const validated = validateConfig(substituted.data);
    if (!validated.success) {
      return this.rejectReload(validated.error);
    }
    return this.applyConfig(validated.data);
  }

  async reloadFromFile(): Promise<Result<void, ConfigError>> {
    logger.info(`Reloading ${this.configService.getConfigPath()}`);
    const loaded = await this.configService.load();
    if (!loaded.success) {
      return this.rejectReload(loaded.error);
    }
    return this.applyConfig(loaded.data);
  }

  async getPreview(): Promise<Result<Buffer, NotFoundError>> {
    const frame = this.controller.getPreviewFrame();
    if (!frame) {
      return failure(NotFoundError.frame());
    }
    return success(await bitmapToPng(frame.image));
  }

  /**
   * Swap in a validated configuration, keeping the current mode
   */
  private applyConfig(config: HubConfig): Result<void, ConfigError> {
    const current = this.runtime.config.display;
    if (
      config.display.width !== current.width ||
      config.display.height !== current.height
    ) {
      const error = ConfigError.invalidValue(
        "display",
        `${config.display.width}x${config.display.height}`,
        `${current.width}x${current.height}; the display size needs a restart`,
      );
      return this.rejectReload(error);
    }

    const mode = this.controller.getMode();
    if (
      mode === DisplayMode.AUTO_ROTATE &&
      config.schedule.layoutSequence.length === 0
    ) {
      const error = ConfigError.invalidValue(
        "schedule.layoutSequence",
        "[]",
        "at least one layout while auto-rotating",
      );
      return this.rejectReload(error);
    }

    const next = HubRuntime.fromConfig(
      config,
      this.catalog,
      this.env,
      this.now,
    );
    this.scheduler.removeJobs(PROVIDER_JOB_PREFIX);
    this.runtime = next;
    this.scheduleProviderJobs(next, this.started);

    // Re-entering the mode drops frames rendered against the old runtime
    // and restarts rotation from the first layout.
    if (this.started) {
      this.controller.setMode(mode);
    }

    logger.info(
      `Configuration reloaded: ${next.registry.names().length} provider(s), ${next.listLayouts().length} layout(s)`,
    );
    return success(undefined);
  }

  private rejectReload(error: ConfigError): Result<void, ConfigError> {
    logger.warn(`Reload rejected: ${error.message}`);
    logger.debug(JSON.stringify(error.toJSON()));
    return failure(error);
  }

  /**
   * One refresh job per provider slot. `immediate` warms a fresh registry.
   */
  private scheduleProviderJobs(runtime: HubRuntime, immediate: boolean): void {
    const { registry, config } = runtime;
    for (const name of registry.names()) {
      this.scheduler.addJob(
        PROVIDER_JOB_PREFIX + name,
        config.providers[name].refreshIntervalSeconds * 1000,
        async () => {
          await registry.refresh(name);
        },
        { immediate },
      );
    }
  }
}
