/**
 * Configuration module for theta.toml parsing.
 *
 * Provides typed configuration parsing with defaults and environment
 * variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig, readConfigFile } from './parser.js';
export type { Config, LoggingConfig, PartialConfig, PathConfig } from './types.js';
export { CONFIG_FILE_NAME, DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_PATHS } from './defaults.js';
export { EnvCoercionError, LOAD_PATH_SEPARATOR, readEnvOverrides, applyEnvOverrides } from './env.js';
export type { EnvRecord } from './env.js';
