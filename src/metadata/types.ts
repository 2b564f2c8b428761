/**
 * Module metadata types.
 *
 * @packageDocumentation
 */

/**
 * A three-part version such as `1.1.0`.
 */
export interface Version {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

/**
 * Header information every Theta module declares before its body.
 *
 * Constructed once per module parse and passed read-only to every
 * parsing function for that module.
 */
export interface Metadata {
  /** Version of the Theta language the module is written in. */
  readonly languageVersion: Version;
  /** Version of the serialization encoding the module targets. */
  readonly encodingVersion: Version;
  /** Dotted name of the module, supplied by whoever loaded the source. */
  readonly moduleName: string;
}

/**
 * Which version field of the metadata a range constrains.
 */
export type VersionField = 'language-version' | 'encoding-version';

/**
 * A half-open range of versions: `lower ≤ version < upper`.
 */
export interface VersionRange {
  readonly field: VersionField;
  readonly lower: Version;
  readonly upper: Version;
}

/**
 * A grammar construct that only exists from some language version onwards.
 */
export interface VersionedFeature {
  /** Name used in error messages, e.g. `enum` or `Fixed`. */
  readonly name: string;
  /** First language version that supports the feature. */
  readonly since: Version;
}
