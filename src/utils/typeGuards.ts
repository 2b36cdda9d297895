/**
 * Type guards and utilities for safe type narrowing
 *
 * These utilities replace `as` type assertions with runtime checks
 * that provide proper type narrowing.
 */

import { DisplayMode } from "@core/types/DisplayTypes";
import { BaseError } from "@core/errors/BaseError";

/**
 * Convert an unknown caught error to an Error instance.
 *
 * @example
 * ```ts
 * try {
 *   await riskyOperation();
 * } catch (err) {
 *   const error = toError(err);
 *   logger.error(error.message);
 * }
 * ```
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === "string") {
    return new Error(error);
  }
  if (typeof error === "object" && error !== null && "message" in error) {
    return new Error(String(error.message));
  }
  return new Error(String(error));
}

/**
 * Type guard for Node.js ErrnoException.
 *
 * @example
 * ```ts
 * try {
 *   await fs.readFile(path);
 * } catch (err) {
 *   if (isNodeJSErrnoException(err) && err.code === "ENOENT") {
 *     // Handle file not found
 *   }
 * }
 * ```
 */
export function isNodeJSErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    ("code" in error || "errno" in error || "syscall" in error)
  );
}

/**
 * Type guard for plain objects (JSON objects, provider payloads)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Type guard for DisplayMode enum values
 */
export function isDisplayMode(value: unknown): value is DisplayMode {
  return value === DisplayMode.MANUAL || value === DisplayMode.AUTO_ROTATE;
}

/**
 * Type guard for BaseError instances
 */
export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

/**
 * Extract error code and user message from a Result error.
 *
 * Works with BaseError subclasses and plain Error instances.
 */
export function extractErrorInfo(error: unknown): {
  code: string;
  message: string;
} {
  if (isBaseError(error)) {
    return {
      code: error.code,
      message: error.getUserMessage(),
    };
  }
  return {
    code: "UNKNOWN_ERROR",
    message: toError(error).message,
  };
}
