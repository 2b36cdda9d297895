import {
  IDisplayTransport,
  IHubService,
  IScheduler,
  IWidgetCatalog,
} from "@core/interfaces";
import { DisplayConfig, DisplayTransportKind, HubConfig } from "@core/types";
import { CONFIG_DEFAULT_PATH } from "@core/constants";
import { ConfigService } from "@services/config/ConfigService";
import { MockDisplayTransport } from "@services/display/MockDisplayTransport";
import { PngFileTransport } from "@services/display/PngFileTransport";
import { HubService } from "@services/hub/HubService";
import { Scheduler } from "@services/scheduler/Scheduler";
import { WidgetCatalog } from "@services/widgets/WidgetCatalog";

/**
 * Display transport factory function type
 */
type TransportFactory = (config: DisplayConfig) => IDisplayTransport;

/**
 * Service Container (Dependency Injection Container)
 *
 * Singleton that manages service instances and their dependencies.
 * Provides factory methods for production and test setters for mocking.
 */
export class ServiceContainer {
  private static instance: ServiceContainer;

  private services: {
    config?: ConfigService;
    scheduler?: IScheduler;
    catalog?: IWidgetCatalog;
    transport?: IDisplayTransport;
    hub?: IHubService;
  } = {};

  /**
   * Registry of display transport factories, keyed by `display.transport`
   */
  private transportFactories: Map<DisplayTransportKind, TransportFactory> =
    new Map();

  private constructor() {
    this.registerDefaultTransports();
  }

  private registerDefaultTransports(): void {
    this.registerDisplayTransport(
      "mock",
      (config) =>
        new MockDisplayTransport(
          config.width,
          config.height,
          config.mockLatencyMs,
        ),
    );
    this.registerDisplayTransport(
      "png",
      (config) =>
        new PngFileTransport(config.width, config.height, config.outputPath),
    );
  }

  /**
   * Get singleton instance
   */
  static getInstance(): ServiceContainer {
    if (!ServiceContainer.instance) {
      ServiceContainer.instance = new ServiceContainer();
    }
    return ServiceContainer.instance;
  }

  /**
   * Reset the container (useful for testing)
   */
  static reset(): void {
    if (ServiceContainer.instance) {
      ServiceContainer.instance.services = {};
      ServiceContainer.instance.transportFactories.clear();
      ServiceContainer.instance.registerDefaultTransports();
    }
  }

  // Factory methods for production

  /**
   * Config service reading HUB_CONFIG_PATH, or ./config/hub.json
   */
  getConfigService(): ConfigService {
    if (!this.services.config) {
      this.services.config = new ConfigService(
        process.env.HUB_CONFIG_PATH || CONFIG_DEFAULT_PATH,
      );
    }
    return this.services.config;
  }

  getScheduler(): IScheduler {
    if (!this.services.scheduler) {
      this.services.scheduler = new Scheduler();
    }
    return this.services.scheduler;
  }

  getWidgetCatalog(): IWidgetCatalog {
    if (!this.services.catalog) {
      this.services.catalog = new WidgetCatalog();
    }
    return this.services.catalog;
  }

  // Display Transport Management

  /**
   * Register a display transport factory
   * @param kind Value of `display.transport` that selects it
   */
  registerDisplayTransport(
    kind: DisplayTransportKind,
    factory: TransportFactory,
  ): void {
    this.transportFactories.set(kind, factory);
  }

  getRegisteredTransports(): DisplayTransportKind[] {
    return [...this.transportFactories.keys()];
  }

  /**
   * Create a display transport by kind
   * @throws Error if no factory is registered for the kind
   */
  createDisplayTransport(config: DisplayConfig): IDisplayTransport {
    const factory = this.transportFactories.get(config.transport);
    if (!factory) {
      const available = this.getRegisteredTransports().join(", ");
      throw new Error(
        `Unknown display transport: '${config.transport}'. Available transports: ${available}`,
      );
    }
    return factory(config);
  }

  getDisplayTransport(config: DisplayConfig): IDisplayTransport {
    if (!this.services.transport) {
      this.services.transport = this.createDisplayTransport(config);
    }
    return this.services.transport;
  }

  /**
   * Hub service for a loaded configuration. Created once per container.
   */
  getHubService(config: HubConfig): IHubService {
    if (!this.services.hub) {
      this.services.hub = new HubService(config, {
        transport: this.getDisplayTransport(config.display),
        scheduler: this.getScheduler(),
        catalog: this.getWidgetCatalog(),
        configService: this.getConfigService(),
      });
    }
    return this.services.hub;
  }

  // Test setters

  setConfigService(service: ConfigService): void {
    this.services.config = service;
  }

  setScheduler(scheduler: IScheduler): void {
    this.services.scheduler = scheduler;
  }

  setDisplayTransport(transport: IDisplayTransport): void {
    this.services.transport = transport;
  }

  setHubService(service: IHubService): void {
    this.services.hub = service;
  }
}
