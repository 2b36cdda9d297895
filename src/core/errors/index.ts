/**
 * Error classes for the Inkboard display hub
 *
 * All custom errors extend BaseError and include:
 * - Error codes for categorization
 * - Timestamps
 * - Context data
 * - Recoverable flag
 * - User-friendly messages (centralized in ErrorMessages.ts)
 */

export * from "./BaseError";
export * from "./FetchError";
export * from "./RenderError";
export * from "./TransportError";
export * from "./ConfigError";
export * from "./NotFoundError";
export * from "./ErrorMessages";
