/**
 * Fully-qualified Theta names.
 *
 * Every type and variant case is identified by the module that declares
 * it plus a local name, written `com.example.Foo`.
 *
 * @packageDocumentation
 */

import { failure, success, type Result } from '../errors/types.js';

/**
 * A fully-qualified name: the declaring module plus a local name.
 */
export interface Name {
  /** Dotted module name, e.g. `com.example`. */
  readonly moduleName: string;
  /** Name within the module, e.g. `Foo`. */
  readonly localName: string;
}

/** Regex pattern for a single identifier. */
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Builds a name.
 */
export function createName(moduleName: string, localName: string): Name {
  return { moduleName, localName };
}

/**
 * Renders a name as `moduleName.localName`.
 */
export function renderName(name: Name): string {
  return `${name.moduleName}.${name.localName}`;
}

/**
 * Two names are equal when both components match.
 */
export function nameEquals(a: Name, b: Name): boolean {
  return a.moduleName === b.moduleName && a.localName === b.localName;
}

/**
 * Checks whether the text is a single identifier.
 */
export function isIdentifier(text: string): boolean {
  return IDENTIFIER_PATTERN.test(text);
}

/**
 * Checks whether the text is a dotted module name such as `com.example`.
 */
export function isModuleName(text: string): boolean {
  return text.split('.').every(isIdentifier);
}

/**
 * Validates a dotted module name.
 *
 * @returns The module name, or an `InvalidName` error.
 */
export function parseModuleName(text: string): Result<string> {
  if (!isModuleName(text)) {
    return failure({ kind: 'InvalidName', text });
  }
  return success(text);
}

/**
 * Parses a fully-qualified name: the last dotted component is the local
 * name and everything before it is the module.
 *
 * @returns The name, `InvalidName` for malformed text, or
 * `UnqualifiedName` when there is no module part.
 *
 * @example
 * ```typescript
 * const result = parseName('com.example.Foo');
 * // { success: true, value: { moduleName: 'com.example', localName: 'Foo' } }
 * ```
 */
export function parseName(text: string): Result<Name> {
  const parts = text.split('.');
  if (!parts.every(isIdentifier)) {
    return failure({ kind: 'InvalidName', text });
  }
  const localName = parts.pop();
  if (localName === undefined || parts.length === 0) {
    return failure({ kind: 'UnqualifiedName', text });
  }
  return success(createName(parts.join('.'), localName));
}
