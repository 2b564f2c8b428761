/**
 * Theta schema language
 *
 * Parses Theta modules (a metadata header followed by type definitions),
 * checks them against the language version they declare, loads module
 * graphs from a load path and validates them as a whole.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

// Names
export {
  createName,
  isIdentifier,
  isModuleName,
  nameEquals,
  parseModuleName,
  parseName,
  renderName,
  type Name,
} from './names/index.js';

// Metadata and versioned features
export {
  ENCODING_VERSIONS,
  FEATURES,
  LANGUAGE_VERSIONS,
  checkSupportedVersions,
  compareVersions,
  createVersion,
  findUnsupportedVersion,
  inRange,
  isFeatureEnabled,
  parseVersion,
  renderVersion,
  versionErrorMessage,
  type Metadata,
  type Version,
  type VersionField,
  type VersionRange,
  type VersionedFeature,
} from './metadata/index.js';

// Type graph
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Parser
export * from './parser/index.js';

// Validation
export { collectViolations, validateModule, validateModules, type ValidateOptions } from './validator/index.js';

// Loading
export * from './loader/index.js';

// Configuration
export * from './config/index.js';

// Logging
export { Logger, type LogEntry, type LogLevel, type LoggerOptions } from './utils/logger.js';
