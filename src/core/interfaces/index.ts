export * from "./IConfigService";
export * from "./IDataProvider";
export * from "./IProviderRegistry";
export * from "./IWidget";
export * from "./ILayoutResolver";
export * from "./IScheduler";
export * from "./IDisplayTransport";
export * from "./ILayoutSource";
export * from "./IDisplayController";
export * from "./IHubService";
