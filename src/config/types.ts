/**
 * Configuration types for theta.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Where modules are looked up.
 */
export interface PathConfig {
  /** Directories searched, in order, for module files. */
  load_path: string[];
  /** File extension of module files, including the dot. */
  extension: string;
}

/**
 * Logging behaviour.
 */
export interface LoggingConfig {
  /** Whether debug-level log entries are written. */
  debug: boolean;
}

/**
 * Complete configuration with every value filled in.
 */
export interface Config {
  paths: PathConfig;
  logging: LoggingConfig;
}

/**
 * Configuration with every value optional, as read from the environment.
 */
export interface PartialConfig {
  paths?: Partial<PathConfig>;
  logging?: Partial<LoggingConfig>;
}
