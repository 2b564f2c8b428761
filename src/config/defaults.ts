/**
 * Default configuration values for theta.toml.
 *
 * @packageDocumentation
 */

import type { Config, LoggingConfig, PathConfig } from './types.js';

/** Name of the configuration file. */
export const CONFIG_FILE_NAME = 'theta.toml';

/**
 * Default module lookup: the current directory, `.theta` files.
 */
export const DEFAULT_PATHS: PathConfig = {
  load_path: ['.'],
  extension: '.theta',
};

/**
 * Default logging: debug entries off.
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  paths: DEFAULT_PATHS,
  logging: DEFAULT_LOGGING,
};
