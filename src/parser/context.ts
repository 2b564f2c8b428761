/**
 * Read-only context threaded through every parsing function.
 *
 * @packageDocumentation
 */

import type { Metadata } from '../metadata/types.js';
import { FEATURES, isFeatureEnabled } from '../metadata/version.js';
import { createName, type Name } from '../names/name.js';
import { PRIMITIVES, type Primitive } from '../types/types.js';

/**
 * Everything a parsing function may consult about the module it is
 * parsing. Never mutated once constructed.
 */
export interface ParseContext {
  readonly metadata: Metadata;
}

/**
 * Builds a context for a module.
 */
export function createParseContext(metadata: Metadata): ParseContext {
  return { metadata };
}

/**
 * Qualifies a local name with the module being parsed.
 */
export function qualify(context: ParseContext, localName: string): Name {
  return createName(context.metadata.moduleName, localName);
}

/**
 * Returns the primitive a word denotes at the module's language version,
 * or `undefined` if the word is an ordinary identifier there.
 */
export function primitiveKeyword(context: ParseContext, word: string): Primitive | undefined {
  const primitive = PRIMITIVES.find((candidate) => candidate === word);
  if (primitive === 'UUID' && !isFeatureEnabled(FEATURES.uuid, context.metadata.languageVersion)) {
    return undefined;
  }
  return primitive;
}

/**
 * Whether a word is reserved at the module's language version and so
 * cannot name a type or a variant case.
 */
export function isReserved(context: ParseContext, word: string): boolean {
  if (word === 'Fixed') {
    return isFeatureEnabled(FEATURES.fixed, context.metadata.languageVersion);
  }
  return primitiveKeyword(context, word) !== undefined;
}
