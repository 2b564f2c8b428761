/**
 * Entry points of the Theta parser.
 *
 * Every function is a pure function of its inputs: it either returns the
 * parsed value or a `ParseError` (or, for whole modules, an
 * `UnsupportedVersion` / `InvalidName` error). Grammar and version errors
 * abort the parse of the current module immediately.
 *
 * @packageDocumentation
 */

import { failure, success, type Result } from '../errors/types.js';
import type { Metadata } from '../metadata/types.js';
import { checkSupportedVersions } from '../metadata/version.js';
import { parseModuleName } from '../names/name.js';
import {
  createModule,
  type Definition,
  type Module,
  type Statement,
  type Type,
} from '../types/types.js';
import { createParseContext, type ParseContext } from './context.js';
import { definition, statement } from './definition.js';
import { Input } from './input.js';
import { metadataSection } from './metadata.js';
import { moduleBody } from './module.js';
import { typeExpression } from './type-expression.js';

/** Name reported in errors when the caller gives none. */
export const DEFAULT_SOURCE_NAME = '<input>';

/**
 * Options shared by the parse functions.
 */
export interface ParseOptions {
  /**
   * Name of the input reported in errors, e.g. a file path.
   * @defaultValue "<input>"
   */
  readonly sourceName?: string;
}

/**
 * Runs a parser over the whole source, allowing surrounding whitespace and
 * comments, and failing on leftover input.
 */
function parseAll<T>(
  source: string,
  options: ParseOptions | undefined,
  parser: (input: Input) => T
): Result<T> {
  const input = new Input(source, options?.sourceName ?? DEFAULT_SOURCE_NAME);
  return input.run((cursor) => {
    cursor.skipSpace();
    const value = parser(cursor);
    cursor.expectEnd();
    return value;
  });
}

/**
 * Parses a type expression such as `[String?]?` or `com.example.Foo`.
 *
 * @param source - Text of the type expression.
 * @param context - Module context: name and language version.
 */
export function parseType(source: string, context: ParseContext, options?: ParseOptions): Result<Type> {
  return parseAll(source, options, (input) => typeExpression(input, context));
}

/**
 * Parses a single definition, with its optional documentation comment.
 *
 * @example
 * ```typescript
 * const context = createParseContext(metadata);
 * const result = parseDefinition('enum Suit = Hearts | Spades', context);
 * ```
 */
export function parseDefinition(
  source: string,
  context: ParseContext,
  options?: ParseOptions
): Result<Definition> {
  return parseAll(source, options, (input) => definition(input, context));
}

/**
 * Parses a single statement: an import or a definition.
 */
export function parseStatement(
  source: string,
  context: ParseContext,
  options?: ParseOptions
): Result<Statement> {
  return parseAll(source, options, (input) => statement(input, context));
}

/**
 * Parses a module body (the part after the `---` separator).
 */
export function parseModuleBody(
  source: string,
  context: ParseContext,
  options?: ParseOptions
): Result<Statement[]> {
  return parseAll(source, options, (input) => moduleBody(input, context));
}

/**
 * Parses the metadata header of a module. Text after the separator is
 * not examined.
 *
 * @param source - Module source text.
 * @param moduleName - Name of the module, supplied by the caller.
 */
export function parseMetadata(
  source: string,
  moduleName: string,
  options?: ParseOptions
): Result<Metadata> {
  const input = new Input(source, options?.sourceName ?? DEFAULT_SOURCE_NAME);
  return input.run((cursor) => metadataSection(cursor, moduleName));
}

/**
 * Parses a complete module: header, version check, then statements.
 *
 * @param source - Module source text.
 * @param moduleName - Dotted module name, supplied by whoever loaded the text.
 * @returns The module, or the first error that stopped the parse.
 *
 * @example
 * ```typescript
 * const result = parseModule(
 *   'language-version: 1.1.0\nencoding-version: 1.0.0\n---\ntype Id = UUID\n',
 *   'com.example'
 * );
 * ```
 */
export function parseModule(source: string, moduleName: string, options?: ParseOptions): Result<Module> {
  const name = parseModuleName(moduleName);
  if (!name.success) {
    return name;
  }

  const input = new Input(source, options?.sourceName ?? DEFAULT_SOURCE_NAME);
  const header = input.run((cursor) => metadataSection(cursor, name.value));
  if (!header.success) {
    return header;
  }

  const supported = checkSupportedVersions(header.value);
  if (!supported.success) {
    return supported;
  }

  const context = createParseContext(header.value);
  const body = input.run((cursor) => moduleBody(cursor, context));
  if (!body.success) {
    return failure(body.error);
  }
  return success(createModule(header.value, body.value, options?.sourceName));
}
