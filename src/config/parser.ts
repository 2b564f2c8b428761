/**
 * TOML configuration parser for theta.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { safeReadTextFile } from '../utils/safe-fs.js';
import { DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_PATHS } from './defaults.js';
import type { Config, LoggingConfig, PathConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/**
 * Checks whether a value is a TOML table.
 */
function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a table, if present.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The table, or `undefined` when the section is absent.
 * @throws ConfigParseError if value is present but not a table.
 */
function validateSection(value: unknown, fieldPath: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected table, got ${typeof value}`);
  }
  return value;
}

/**
 * Validates that a value is a non-empty string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a non-empty string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  if (value.trim() === '') {
    throw new ConfigParseError(`Invalid value for '${fieldPath}': must not be empty`);
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is an array of non-empty strings.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string array.
 * @throws ConfigParseError if value is not an array of strings.
 */
function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array, got ${typeof value}`
    );
  }
  return value.map((item: unknown, index) => validateString(item, `${fieldPath}[${String(index)}]`));
}

/**
 * Parses path configuration from raw TOML data.
 *
 * @param raw - Raw TOML object for the paths section.
 * @returns Validated path configuration merged with defaults.
 */
function parsePaths(raw: Record<string, unknown> | undefined): PathConfig {
  const result: PathConfig = { ...DEFAULT_PATHS, load_path: [...DEFAULT_PATHS.load_path] };
  if (raw === undefined) {
    return result;
  }

  if ('load_path' in raw) {
    result.load_path = validateStringArray(raw.load_path, 'paths.load_path');
    if (result.load_path.length === 0) {
      throw new ConfigParseError(`Invalid value for 'paths.load_path': must list at least one directory`);
    }
  }
  if ('extension' in raw) {
    result.extension = validateString(raw.extension, 'paths.extension');
    if (!result.extension.startsWith('.')) {
      throw new ConfigParseError(
        `Invalid value for 'paths.extension': must start with '.', got '${result.extension}'`
      );
    }
  }

  return result;
}

/**
 * Parses logging configuration from raw TOML data.
 *
 * @param raw - Raw TOML object for the logging section.
 * @returns Validated logging configuration merged with defaults.
 */
function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [paths]
 * load_path = ["schemas", "vendor/schemas"]
 * `);
 * console.log(config.paths.load_path); // ["schemas", "vendor/schemas"]
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: TOML.JsonMap;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  return {
    paths: parsePaths(validateSection(parsed.paths, 'paths')),
    logging: parseLogging(validateSection(parsed.logging, 'logging')),
  };
}

/**
 * Reads and parses a configuration file.
 *
 * @param filePath - Path of the theta.toml file.
 * @throws ConfigParseError if the file cannot be read or is invalid.
 */
export async function readConfigFile(filePath: string): Promise<Config> {
  let content: string;
  try {
    content = await safeReadTextFile(filePath);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Cannot read configuration file '${filePath}': ${cause.message}`, cause);
  }
  return parseConfig(content);
}

/**
 * Returns a copy of the default configuration.
 *
 * @example
 * ```typescript
 * const config = getDefaultConfig();
 * console.log(config.paths.extension); // ".theta"
 * ```
 */
export function getDefaultConfig(): Config {
  return {
    paths: { ...DEFAULT_CONFIG.paths, load_path: [...DEFAULT_CONFIG.paths.load_path] },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
