/**
 * Module metadata: versions, supported ranges and versioned features.
 *
 * @packageDocumentation
 */

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
} from './version.js';
export type { Metadata, Version, VersionField, VersionRange, VersionedFeature } from './types.js';
