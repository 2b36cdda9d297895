/**
 * Centralized user-facing messages for every error code.
 *
 * Uses string literals for the codes to avoid circular imports with the
 * error class files. The keys match the enum values in each error class.
 *
 * @example
 * ```typescript
 * import { getUserMessage } from "@errors/ErrorMessages";
 *
 * getUserMessage("FETCH_TIMEOUT");
 * // "The data source took too long to answer. Cached data is shown."
 * ```
 */

export const FETCH_ERROR_MESSAGES: Record<string, string> = {
  FETCH_NETWORK: "Could not reach the data source. Cached data is shown.",
  FETCH_HTTP_STATUS: "The data source returned an error. Cached data is shown.",
  FETCH_AUTH: "The data source rejected the credentials. Check configuration.",
  FETCH_PARSE: "The data source sent data that could not be read.",
  FETCH_TIMEOUT:
    "The data source took too long to answer. Cached data is shown.",
  FETCH_UNKNOWN_ERROR: "Fetching data failed. Cached data is shown.",
};

export const RENDER_ERROR_MESSAGES: Record<string, string> = {
  RENDER_UNKNOWN_WIDGET: "A widget on this layout is not available.",
  RENDER_UNKNOWN_PROVIDER: "A widget on this layout uses an unknown provider.",
  RENDER_WIDGET_FAILED: "A widget could not be drawn and shows a placeholder.",
  RENDER_UNKNOWN_ERROR: "Part of the layout could not be drawn.",
};

export const TRANSPORT_ERROR_MESSAGES: Record<string, string> = {
  TRANSPORT_PUSH_FAILED:
    "The display did not accept the image. The next update will retry.",
  TRANSPORT_SIZE_MISMATCH:
    "Image size does not match the display. Check configuration.",
  TRANSPORT_BUSY: "The display is still updating. Please wait.",
  TRANSPORT_UNKNOWN_ERROR: "Display error occurred. The next update will retry.",
};

export const CONFIG_ERROR_MESSAGES: Record<string, string> = {
  CONFIG_FILE_NOT_FOUND: "Configuration file not found.",
  CONFIG_FILE_READ_ERROR: "Configuration file could not be read.",
  CONFIG_INVALID_JSON: "Configuration file is not valid JSON.",
  CONFIG_MISSING_ENV_VAR: "Configuration references an unset variable.",
  CONFIG_INVALID_CONFIG:
    "Configuration is invalid. The previous configuration stays active.",
  CONFIG_INVALID_VALUE: "A configuration value is invalid.",
  CONFIG_UNKNOWN_ERROR: "Configuration error occurred.",
};

export const NOT_FOUND_ERROR_MESSAGES: Record<string, string> = {
  NOT_FOUND_PROVIDER: "No provider with that name.",
  NOT_FOUND_LAYOUT: "No layout with that name.",
  NOT_FOUND_JOB: "No scheduled job with that key.",
  NOT_FOUND_FRAME: "Nothing has been rendered yet.",
};

export const ERROR_MESSAGES: Record<string, string> = {
  ...FETCH_ERROR_MESSAGES,
  ...RENDER_ERROR_MESSAGES,
  ...TRANSPORT_ERROR_MESSAGES,
  ...CONFIG_ERROR_MESSAGES,
  ...NOT_FOUND_ERROR_MESSAGES,
};

/**
 * Fallbacks by code prefix, for codes added without a table entry
 */
export const DEFAULT_ERROR_MESSAGES: Record<string, string> = {
  FETCH: "Fetching data failed. Cached data is shown.",
  RENDER: "Part of the layout could not be drawn.",
  TRANSPORT: "Display error occurred. The next update will retry.",
  CONFIG: "Configuration error occurred.",
  NOT: "The requested item does not exist.",
};

export const FALLBACK_ERROR_MESSAGE = "An error occurred. Please try again.";

/**
 * Look up the user message for an error code.
 * Unknown codes fall back to their category, then to a generic message.
 */
export function getUserMessage(code: string): string {
  const message = ERROR_MESSAGES[code];
  if (message) {
    return message;
  }

  const category = code.split("_")[0];
  const defaultMessage = DEFAULT_ERROR_MESSAGES[category];
  if (defaultMessage) {
    return defaultMessage;
  }

  return FALLBACK_ERROR_MESSAGE;
}
