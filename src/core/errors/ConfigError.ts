import { BaseError } from "./BaseError";

/**
 * Config-related error codes
 */
export enum ConfigErrorCode {
  // File errors
  FILE_NOT_FOUND = "CONFIG_FILE_NOT_FOUND",
  FILE_READ_ERROR = "CONFIG_FILE_READ_ERROR",

  // Parsing errors
  INVALID_JSON = "CONFIG_INVALID_JSON",
  MISSING_ENV_VAR = "CONFIG_MISSING_ENV_VAR",

  // Validation errors
  INVALID_CONFIG = "CONFIG_INVALID_CONFIG",
  INVALID_VALUE = "CONFIG_INVALID_VALUE",

  // Generic
  UNKNOWN = "CONFIG_UNKNOWN_ERROR",
}

/**
 * A configuration could not be loaded or failed validation.
 * The previously active configuration stays in place.
 */
export class ConfigError extends BaseError {
  /**
   * Individual validation problems, as `path: message`
   */
  public readonly issues: string[];

  constructor(
    message: string,
    code: ConfigErrorCode = ConfigErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    issues: string[] = [],
  ) {
    super(message, code, false, context);
    this.issues = issues;
  }

  /**
   * Create error for file not found
   */
  static fileNotFound(filePath: string): ConfigError {
    return new ConfigError(
      `Configuration file not found: ${filePath}`,
      ConfigErrorCode.FILE_NOT_FOUND,
      { filePath },
    );
  }

  /**
   * Create error for file read failure
   */
  static readError(filePath: string, error: Error): ConfigError {
    return new ConfigError(
      `Failed to read configuration file: ${error.message}`,
      ConfigErrorCode.FILE_READ_ERROR,
      { filePath, originalError: error.message },
    );
  }

  /**
   * Create error for invalid JSON
   */
  static invalidJSON(filePath: string, error: Error): ConfigError {
    return new ConfigError(
      `Invalid JSON in configuration file: ${error.message}`,
      ConfigErrorCode.INVALID_JSON,
      { filePath, originalError: error.message },
    );
  }

  static missingEnvVar(name: string): ConfigError {
    return new ConfigError(
      `Missing environment variable: ${name}`,
      ConfigErrorCode.MISSING_ENV_VAR,
      { variable: name },
    );
  }

  /**
   * Create error for a tree that failed schema validation
   */
  static invalidConfig(issues: string[]): ConfigError {
    return new ConfigError(
      `Invalid configuration: ${issues.join("; ")}`,
      ConfigErrorCode.INVALID_CONFIG,
      { issueCount: issues.length },
      issues,
    );
  }

  /**
   * Create error for invalid value
   */
  static invalidValue(
    field: string,
    value: unknown,
    expected: string,
  ): ConfigError {
    return new ConfigError(
      `Invalid value for ${field}: ${String(value)} (expected: ${expected})`,
      ConfigErrorCode.INVALID_VALUE,
      { field, value, expected },
    );
  }
}
