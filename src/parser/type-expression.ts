/**
 * Type expressions.
 *
 * ```
 * typeExpr := atom "?"?
 * atom     := primitive | "Fixed(" int ")" | "[" typeExpr "]" | "{" typeExpr "}" | reference
 * ```
 *
 * @packageDocumentation
 */

import { FEATURES, isFeatureEnabled } from '../metadata/version.js';
import { createName } from '../names/name.js';
import {
  arrayType,
  fixedType,
  mapType,
  optionalType,
  primitiveType,
  referenceType,
  type ArrayType,
  type FixedType,
  type MapType,
  type ReferenceType,
  type Type,
} from '../types/types.js';
import { primitiveKeyword, qualify, type ParseContext } from './context.js';
import { isIdentifierStart, type Input } from './input.js';

/**
 * Parses a non-negative decimal integer and the whitespace after it.
 */
export function integer(input: Input): number {
  const pattern = /\d+/y;
  pattern.lastIndex = input.offset;
  const match = pattern.exec(input.source);
  if (match === null) {
    input.fail(['non-negative integer']);
  }
  const value = Number(match[0]);
  if (!Number.isSafeInteger(value)) {
    input.failWith(`integer ${match[0]} is too large`);
  }
  input.offset += match[0].length;
  input.skipSpace();
  return value;
}

/**
 * Parses a dotted reference. A single identifier is qualified with the
 * current module.
 */
export function reference(input: Input, context: ParseContext): ReferenceType {
  const parts = [input.identifier('type')];
  while (input.peek() === '.' && isIdentifierStart(input.source[input.offset + 1])) {
    input.offset += 1;
    parts.push(input.identifier());
  }
  input.skipSpace();

  const localName = parts.pop() ?? '';
  const name = parts.length === 0 ? qualify(context, localName) : createName(parts.join('.'), localName);
  return referenceType(name);
}

/**
 * Parses `Fixed(N)`. The caller has already checked that the feature is
 * available.
 */
export function fixed(input: Input): FixedType {
  if (!input.atKeyword('Fixed')) {
    input.fail(["'Fixed'"]);
  }
  input.offset += 'Fixed'.length;
  if (!input.startsWith('(')) {
    input.fail(["'('"]);
  }
  input.expectSymbol('(');
  const size = integer(input);
  input.expectSymbol(')');
  return fixedType(size);
}

/** How deeply `[...]` and `{...}` may nest inside one type expression. */
export const MAX_NESTING_DEPTH = 256;

/** `[T]` */
export function array(input: Input, context: ParseContext): ArrayType {
  return input.nested(MAX_NESTING_DEPTH, () => {
    input.expectSymbol('[');
    const element = typeExpression(input, context);
    input.expectSymbol(']');
    return arrayType(element);
  });
}

/** `{T}` */
export function map(input: Input, context: ParseContext): MapType {
  return input.nested(MAX_NESTING_DEPTH, () => {
    input.expectSymbol('{');
    const value = typeExpression(input, context);
    input.expectSymbol('}');
    return mapType(value);
  });
}

/**
 * Parses a single type without a trailing optional marker.
 */
export function atom(input: Input, context: ParseContext): Type {
  if (input.startsWith('[')) {
    return array(input, context);
  }
  if (input.startsWith('{')) {
    return map(input, context);
  }
  input.note("'['");
  input.note("'{'");

  const word = input.peekIdentifier();
  if (word === undefined) {
    input.fail(['type']);
  }

  const primitive = primitiveKeyword(context, word);
  if (primitive !== undefined) {
    input.offset += word.length;
    input.skipSpace();
    return primitiveType(primitive);
  }

  if (word === 'Fixed') {
    const { languageVersion } = context.metadata;
    const enabled = isFeatureEnabled(FEATURES.fixed, languageVersion);
    if (enabled) {
      return fixed(input);
    }
    if (input.startsWith('Fixed(')) {
      input.failVersion(FEATURES.fixed, languageVersion);
    }
  }

  return reference(input, context);
}

/**
 * Parses a type expression: an atom optionally followed by `?`.
 *
 * @example
 * ```typescript
 * // "[String?]?" → Optional(Array(Optional(String)))
 * ```
 */
export function typeExpression(input: Input, context: ParseContext): Type {
  const element = atom(input, context);
  return input.symbol('?') ? optionalType(element) : element;
}
