/**
 * The metadata header of a module.
 *
 * ```
 * language-version: 1.1.0
 * encoding-version: 1.0.0
 * ---
 * ```
 *
 * Comments may appear anywhere in the header, including between a key
 * and its value.
 *
 * @packageDocumentation
 */

import type { Metadata, Version } from '../metadata/types.js';
import { parseVersion } from '../metadata/version.js';
import type { Input } from './input.js';

/** Separator between the header and the module body. */
export const SEPARATOR = '---';

/**
 * Header keys and the metadata field each one sets. `avro-version` is the
 * original spelling of `encoding-version`.
 */
const METADATA_KEYS: ReadonlyMap<string, 'languageVersion' | 'encodingVersion'> = new Map([
  ['language-version', 'languageVersion'],
  ['encoding-version', 'encodingVersion'],
  ['avro-version', 'encodingVersion'],
]);

/** Key names reported when a required key is missing. */
const REQUIRED_KEYS = {
  languageVersion: 'language-version',
  encodingVersion: 'encoding-version',
} as const;

function version(input: Input): Version {
  const start = input.offset;
  const pattern = /[0-9A-Za-z_.+-]+/y;
  pattern.lastIndex = start;
  const match = pattern.exec(input.source);
  if (match === null) {
    input.fail(['version']);
  }
  const parsed = parseVersion(match[0]);
  if (parsed === undefined) {
    input.failWith(`invalid version ‘${match[0]}’: expected a version like ‘1.0.0’`, start);
  }
  input.offset += match[0].length;
  return parsed;
}

function separator(input: Input): void {
  const lineStart = input.source.lastIndexOf('\n', input.offset - 1) + 1;
  if (input.source.slice(lineStart, input.offset).trim() !== '') {
    input.failWith(`the ‘${SEPARATOR}’ separator must be on a line of its own`);
  }
  input.offset += SEPARATOR.length;
  const rest = input.skipLine();
  if (rest.trim() !== '') {
    input.failWith(`the ‘${SEPARATOR}’ separator must be on a line of its own`);
  }
}

/**
 * Parses the metadata header up to and including the separator line.
 *
 * @param moduleName - Name of the module, supplied by the caller.
 */
export function metadataSection(input: Input, moduleName: string): Metadata {
  const values: { languageVersion?: Version; encodingVersion?: Version } = {};
  const headerStart = input.offset;

  for (;;) {
    input.skipSpaceAndDocs();
    if (input.startsWith(SEPARATOR)) {
      separator(input);
      break;
    }
    if (input.atEnd) {
      input.fail([`'${SEPARATOR}'`, 'metadata key']);
    }

    const keyStart = input.offset;
    const pattern = /[A-Za-z][A-Za-z0-9-]*/y;
    pattern.lastIndex = keyStart;
    const key = pattern.exec(input.source)?.[0];
    const field = key === undefined ? undefined : METADATA_KEYS.get(key);
    if (key === undefined || field === undefined) {
      input.fail(['language-version', 'encoding-version', `'${SEPARATOR}'`]);
    }
    if (values[field] !== undefined) {
      input.failWith(`duplicate metadata key ‘${key}’`, keyStart);
    }
    input.offset += key.length;

    input.skipSpaceAndDocs();
    if (!input.startsWith(':')) {
      input.fail(["':'"]);
    }
    input.offset += 1;
    input.skipSpaceAndDocs();
    values[field] = version(input);
  }

  const { languageVersion, encodingVersion } = values;
  if (languageVersion === undefined) {
    input.failWith(`missing required metadata key ‘${REQUIRED_KEYS.languageVersion}’`, headerStart);
  }
  if (encodingVersion === undefined) {
    input.failWith(`missing required metadata key ‘${REQUIRED_KEYS.encodingVersion}’`, headerStart);
  }
  return { languageVersion, encodingVersion, moduleName };
}
