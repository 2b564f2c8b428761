/**
 * Definitions and statements.
 *
 * ```
 * definition  := doc? ( "enum" Name "=" symbol ("|" symbol)*
 *                     | "type" Name "=" (recordBody | variantBody | typeExpr)
 *                     | "alias" Name "=" typeExpr )
 * recordBody  := "{" (doc? field ("," doc? field)*)? "}"
 * variantBody := doc? case ("|" doc? case)*
 * case        := identifier ("{" (doc? field ("," doc? field)*)? "}")?
 * ```
 *
 * @packageDocumentation
 */

import { FEATURES, isFeatureEnabled } from '../metadata/version.js';
import type { Name } from '../names/name.js';
import {
  createCase,
  createDefinition,
  createField,
  enumType,
  newtypeType,
  recordType,
  variantType,
  type Case,
  type Definition,
  type Field,
  type ImportStatement,
  type Statement,
  type Type,
} from '../types/types.js';
import { isReserved, qualify, type ParseContext } from './context.js';
import { optionalDoc } from './doc.js';
import { isIdentifierStart, type Input } from './input.js';
import { typeExpression } from './type-expression.js';

/**
 * Parses the name a definition or case declares, rejecting words that
 * are reserved at the module's language version.
 */
function declaredName(input: Input, context: ParseContext, label: string): Name {
  const start = input.offset;
  const word = input.identifier(label);
  if (isReserved(context, word)) {
    input.failWith(`‘${word}’ is a reserved word and cannot be used as a name`, start);
  }
  input.skipSpace();
  return qualify(context, word);
}

/**
 * Parses `doc? name : type`.
 */
export function field(input: Input, context: ParseContext): Field {
  const doc = optionalDoc(input);
  const name = input.identifier('field name');
  input.skipSpace();
  input.expectSymbol(':');
  const type = typeExpression(input, context);
  return createField(name, type, doc);
}

/**
 * Parses a brace-delimited, comma-separated list of fields. Zero fields
 * is allowed.
 */
export function fieldBlock(input: Input, context: ParseContext): Field[] {
  input.expectSymbol('{');
  const fields: Field[] = [];
  if (input.symbol('}')) {
    return fields;
  }
  do {
    fields.push(field(input, context));
  } while (input.symbol(','));
  input.expectSymbol('}');
  return fields;
}

/**
 * Parses a single variant case with its optional field block.
 *
 * @returns The case and whether it had an explicit field block.
 */
function variantCase(
  input: Input,
  context: ParseContext
): { readonly variantCase: Case; readonly hasBlock: boolean } {
  const doc = optionalDoc(input);
  const word = input.peekIdentifier();
  if (word !== undefined && input.source[input.offset + word.length] === '.') {
    input.fail(['case name']);
  }
  const name = declaredName(input, context, 'case name');

  const hasBlock = input.startsWith('{');
  if (!hasBlock) {
    input.note("'{'");
  }
  const fields = hasBlock ? fieldBlock(input, context) : [];
  return { variantCase: createCase(name, fields, doc), hasBlock };
}

/**
 * Parses the cases of a variant. A single case without a field block is
 * rejected so that `type Foo = Bar` parses as a newtype.
 */
function variantBody(input: Input, context: ParseContext): Case[] {
  const first = variantCase(input, context);
  const cases = [first.variantCase];
  while (input.symbol('|')) {
    cases.push(variantCase(input, context).variantCase);
  }
  if (cases.length === 1 && !first.hasBlock) {
    input.fail(["'|'"]);
  }
  return cases;
}

/**
 * Parses the right-hand side of `type Name =`, trying a record body, then
 * a variant, then a plain type expression.
 */
function typeBody(input: Input, context: ParseContext, name: Name): Type {
  const fields = input.attempt(() => fieldBlock(input, context));
  if (fields !== undefined) {
    return recordType(name, fields);
  }
  const cases = input.attempt(() => variantBody(input, context));
  if (cases !== undefined) {
    return variantType(name, cases);
  }
  return newtypeType(name, typeExpression(input, context));
}

function typeDefinition(input: Input, context: ParseContext, doc: string | undefined): Definition {
  const name = declaredName(input, context, 'type name');
  input.expectSymbol('=');
  return createDefinition(name, typeBody(input, context, name), doc);
}

function aliasDefinition(input: Input, context: ParseContext, doc: string | undefined): Definition {
  const name = declaredName(input, context, 'type name');
  input.expectSymbol('=');
  return createDefinition(name, typeExpression(input, context), doc);
}

function enumDefinition(input: Input, context: ParseContext, doc: string | undefined): Definition {
  const name = declaredName(input, context, 'type name');
  input.expectSymbol('=');
  const symbols: string[] = [];
  do {
    symbols.push(input.identifier('enum symbol'));
    input.skipSpace();
  } while (input.symbol('|'));
  return createDefinition(name, enumType(name, symbols), doc);
}

/**
 * Parses one definition together with the documentation comment in front
 * of it.
 */
export function definition(input: Input, context: ParseContext): Definition {
  const doc = optionalDoc(input);
  if (input.keyword('type')) {
    return typeDefinition(input, context, doc);
  }
  if (input.keyword('alias')) {
    return aliasDefinition(input, context, doc);
  }

  const { languageVersion } = context.metadata;
  if (input.atKeyword('enum')) {
    if (!isFeatureEnabled(FEATURES.enum, languageVersion)) {
      input.failVersion(FEATURES.enum, languageVersion);
    }
    input.keyword('enum');
    return enumDefinition(input, context, doc);
  }
  if (isFeatureEnabled(FEATURES.enum, languageVersion)) {
    input.note('enum');
  }
  return input.fail([]);
}

/**
 * Parses `import com.example.module`.
 */
export function importStatement(input: Input): ImportStatement {
  if (!input.keyword('import')) {
    input.fail([]);
  }
  const parts = [input.identifier('module name')];
  while (input.peek() === '.' && isIdentifierStart(input.source[input.offset + 1])) {
    input.offset += 1;
    parts.push(input.identifier('module name'));
  }
  input.skipSpace();
  return { kind: 'Import', moduleName: parts.join('.') };
}

/**
 * Parses one module statement.
 */
export function statement(input: Input, context: ParseContext): Statement {
  if (input.atKeyword('import')) {
    return importStatement(input);
  }
  input.note('import');
  return { kind: 'Definition', definition: definition(input, context) };
}
