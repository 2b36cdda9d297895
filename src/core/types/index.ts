/**
 * Core types for the Inkboard display hub
 *
 * This barrel file exports all type definitions used throughout the application.
 */
export * from "./ResultTypes";
export * from "./ConfigTypes";
export * from "./DisplayTypes";
export * from "./ProviderTypes";
export * from "./LayoutTypes";
export * from "./SchedulerTypes";
