/**
 * THETA_* environment variable overrides.
 *
 * Override precedence: env > theta.toml > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/**
 * Shape of `process.env`.
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Thrown when an environment variable holds a value its setting cannot take.
 */
export class EnvCoercionError extends Error {
  /** Variable that failed coercion. */
  public readonly envVar: string;
  /** Value as found in the environment. */
  public readonly rawValue: string;
  /** What the value should have been. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Replaces the default message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    super(message ?? `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/** Separator between directories in THETA_LOAD_PATH. */
export const LOAD_PATH_SEPARATOR = ':';

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

function toBoolean(envVar: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUTHY.includes(normalized)) {
    return true;
  }
  if (FALSY.includes(normalized)) {
    return false;
  }
  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

/**
 * Splits a load path into its directories, dropping empty segments.
 */
function toPathList(envVar: string, value: string): string[] {
  const directories = value
    .split(LOAD_PATH_SEPARATOR)
    .map((segment) => segment.trim())
    .filter((segment) => segment !== '');
  if (directories.length === 0) {
    throw new EnvCoercionError(envVar, value, 'path list', `Empty load path in '${envVar}'`);
  }
  return directories;
}

/**
 * Module file extensions follow the same rule as `paths.extension` in
 * theta.toml.
 */
function toExtension(envVar: string, value: string): string {
  if (!value.startsWith('.')) {
    throw new EnvCoercionError(
      envVar,
      value,
      'file extension',
      `Invalid value for '${envVar}': must start with '.', got '${value}'`
    );
  }
  return value;
}

/**
 * Recognised variables and how each one lands in the overrides, in
 * application order. Later entries win, so `THETA_LOGGING_DEBUG`
 * overrides the `THETA_DEBUG` shortcut.
 */
const ENV_OVERRIDES: ReadonlyArray<
  readonly [string, (overrides: PartialConfig, envVar: string, value: string) => void]
> = [
  [
    'THETA_LOAD_PATH',
    (overrides, envVar, value) => {
      overrides.paths = { ...overrides.paths, load_path: toPathList(envVar, value) };
    },
  ],
  [
    'THETA_PATHS_EXTENSION',
    (overrides, envVar, value) => {
      overrides.paths = { ...overrides.paths, extension: toExtension(envVar, value) };
    },
  ],
  [
    'THETA_DEBUG',
    (overrides, envVar, value) => {
      overrides.logging = { debug: toBoolean(envVar, value) };
    },
  ],
  [
    'THETA_LOGGING_DEBUG',
    (overrides, envVar, value) => {
      overrides.logging = { debug: toBoolean(envVar, value) };
    },
  ],
];

/**
 * Reads the THETA_* variables into a partial configuration. Unset and
 * empty variables are ignored.
 *
 * @throws EnvCoercionError on the first variable whose value is invalid.
 *
 * @example
 * ```typescript
 * readEnvOverrides({ THETA_LOAD_PATH: 'schemas:vendor' });
 * // { paths: { load_path: ['schemas', 'vendor'] } }
 * ```
 */
export function readEnvOverrides(env: EnvRecord = process.env): PartialConfig {
  const overrides: PartialConfig = {};
  for (const [envVar, apply] of ENV_OVERRIDES) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      apply(overrides, envVar, value);
    }
  }
  return overrides;
}

/**
 * Applies environment variable overrides to a configuration. The base
 * configuration is not modified.
 *
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 *
 * @example
 * ```typescript
 * const config = applyEnvOverrides(parseConfig(tomlContent));
 * // THETA_DEBUG=1 turns on debug logging regardless of theta.toml
 * ```
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const overrides = readEnvOverrides(env);
  return {
    paths: { ...config.paths, ...overrides.paths },
    logging: { ...config.logging, ...overrides.logging },
  };
}
