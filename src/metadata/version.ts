/**
 * Version parsing, comparison and the table of versioned features.
 *
 * @packageDocumentation
 */

import { failure, success, type Result } from '../errors/types.js';
import type { Metadata, Version, VersionRange, VersionedFeature } from './types.js';

/** Regex pattern for a three-part version. */
const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

/**
 * Builds a version from its components.
 */
export function createVersion(major: number, minor: number, patch: number): Version {
  return { major, minor, patch };
}

/**
 * Parses `N.N.N` into a version.
 *
 * @param text - Version text.
 * @returns The version, or `undefined` when the text is not `N.N.N`.
 */
export function parseVersion(text: string): Version | undefined {
  const match = VERSION_PATTERN.exec(text);
  if (match === null) {
    return undefined;
  }
  const [, major, minor, patch] = match;
  if (major === undefined || minor === undefined || patch === undefined) {
    return undefined;
  }
  return createVersion(Number(major), Number(minor), Number(patch));
}

/**
 * Renders a version as `N.N.N`.
 */
export function renderVersion(version: Version): string {
  return `${String(version.major)}.${String(version.minor)}.${String(version.patch)}`;
}

/**
 * Compares two versions component by component.
 *
 * @returns A negative number if `a < b`, zero if equal, positive if `a > b`.
 */
export function compareVersions(a: Version, b: Version): number {
  if (a.major !== b.major) {
    return a.major - b.major;
  }
  if (a.minor !== b.minor) {
    return a.minor - b.minor;
  }
  return a.patch - b.patch;
}

/**
 * Checks whether `version` falls inside `lower ≤ version < upper`.
 */
export function inRange(version: Version, range: VersionRange): boolean {
  return compareVersions(version, range.lower) >= 0 && compareVersions(version, range.upper) < 0;
}

/** Language versions this release understands. */
export const LANGUAGE_VERSIONS: VersionRange = {
  field: 'language-version',
  lower: createVersion(1, 0, 0),
  upper: createVersion(1, 2, 0),
};

/** Encoding versions this release understands. */
export const ENCODING_VERSIONS: VersionRange = {
  field: 'encoding-version',
  lower: createVersion(1, 0, 0),
  upper: createVersion(1, 1, 0),
};

/**
 * Grammar constructs gated on the module's language version.
 */
export const FEATURES = {
  enum: { name: 'enum', since: createVersion(1, 1, 0) },
  fixed: { name: 'Fixed', since: createVersion(1, 1, 0) },
  uuid: { name: 'UUID', since: createVersion(1, 1, 0) },
} as const satisfies Record<string, VersionedFeature>;

/**
 * Checks whether a feature is available at the given language version.
 */
export function isFeatureEnabled(feature: VersionedFeature, languageVersion: Version): boolean {
  return compareVersions(languageVersion, feature.since) >= 0;
}

/**
 * Builds the message reported when a module uses a feature its
 * language version does not have.
 */
export function versionErrorMessage(feature: string, required: Version, actual: Version): string {
  return `\`${feature}\` requires language-version ≥ ${renderVersion(required)} but this module has language-version ${renderVersion(actual)}.`;
}

/**
 * Finds the first version field of the metadata outside the range this
 * release supports.
 *
 * @returns The violated range and the offending version, or `undefined`
 * when both versions are supported.
 */
export function findUnsupportedVersion(
  metadata: Metadata
): { readonly range: VersionRange; readonly version: Version } | undefined {
  if (!inRange(metadata.languageVersion, LANGUAGE_VERSIONS)) {
    return { range: LANGUAGE_VERSIONS, version: metadata.languageVersion };
  }
  if (!inRange(metadata.encodingVersion, ENCODING_VERSIONS)) {
    return { range: ENCODING_VERSIONS, version: metadata.encodingVersion };
  }
  return undefined;
}

/**
 * Checks that this release supports both versions a module declares.
 *
 * @returns The metadata, or an `UnsupportedVersion` error.
 */
export function checkSupportedVersions(metadata: Metadata): Result<Metadata> {
  const unsupported = findUnsupportedVersion(metadata);
  if (unsupported !== undefined) {
    return failure({ kind: 'UnsupportedVersion', metadata, ...unsupported });
  }
  return success(metadata);
}
