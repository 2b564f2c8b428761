/**
 * The abstract type graph produced by the parser.
 *
 * @packageDocumentation
 */

import type { Metadata } from '../metadata/types.js';
import type { Name } from '../names/name.js';

/**
 * Built-in primitive types.
 */
export type Primitive =
  | 'Bool'
  | 'Bytes'
  | 'Int'
  | 'Long'
  | 'Float'
  | 'Double'
  | 'String'
  | 'Date'
  | 'Datetime'
  | 'UUID';

/**
 * All primitives, in declaration order.
 */
export const PRIMITIVES: readonly Primitive[] = [
  'Bool',
  'Bytes',
  'Int',
  'Long',
  'Float',
  'Double',
  'String',
  'Date',
  'Datetime',
  'UUID',
];

/**
 * Normalized documentation text attached to a definition, field or case.
 */
export type Doc = string;

export interface PrimitiveType {
  readonly kind: 'Primitive';
  readonly primitive: Primitive;
}

/** Fixed-size byte string. */
export interface FixedType {
  readonly kind: 'Fixed';
  readonly size: number;
}

/** Homogeneous ordered sequence. */
export interface ArrayType {
  readonly kind: 'Array';
  readonly element: Type;
}

/** Homogeneous values keyed by strings. */
export interface MapType {
  readonly kind: 'Map';
  readonly value: Type;
}

/** A value that may be absent. */
export interface OptionalType {
  readonly kind: 'Optional';
  readonly element: Type;
}

/** A use of a named type, resolved by the validator. */
export interface ReferenceType {
  readonly kind: 'Reference';
  readonly name: Name;
}

export interface RecordType {
  readonly kind: 'Record';
  readonly name: Name;
  /** Fields in encoding order. */
  readonly fields: readonly Field[];
}

export interface VariantType {
  readonly kind: 'Variant';
  readonly name: Name;
  readonly cases: readonly Case[];
}

export interface EnumType {
  readonly kind: 'Enum';
  readonly name: Name;
  /** Symbols in declaration order. */
  readonly symbols: readonly string[];
}

/** A nominally distinct wrapper around another type. */
export interface NewtypeType {
  readonly kind: 'Newtype';
  readonly name: Name;
  readonly underlying: Type;
}

/**
 * Any Theta type.
 */
export type Type =
  | PrimitiveType
  | FixedType
  | ArrayType
  | MapType
  | OptionalType
  | ReferenceType
  | RecordType
  | VariantType
  | EnumType
  | NewtypeType;

/**
 * A record field or a field of a variant case.
 */
export interface Field {
  readonly name: string;
  readonly doc?: Doc;
  readonly type: Type;
}

/**
 * One case of a variant. The name is qualified by the module, not by the
 * variant.
 */
export interface Case {
  readonly name: Name;
  readonly doc?: Doc;
  readonly fields: readonly Field[];
}

/**
 * A named, optionally documented top-level declaration.
 */
export interface Definition {
  readonly name: Name;
  readonly doc?: Doc;
  readonly type: Type;
}

/** `import com.example.foo` */
export interface ImportStatement {
  readonly kind: 'Import';
  readonly moduleName: string;
}

export interface DefinitionStatement {
  readonly kind: 'Definition';
  readonly definition: Definition;
}

/**
 * One statement of a module body.
 */
export type Statement = ImportStatement | DefinitionStatement;

/**
 * A parsed module.
 */
export interface Module {
  /** Dotted module name. */
  readonly name: string;
  readonly metadata: Metadata;
  /** Names of the modules this module imports, in source order. */
  readonly imports: readonly string[];
  /** Definitions in source order. */
  readonly definitions: readonly Definition[];
  /** Where the module was read from, if it came from a file. */
  readonly source?: string;
}

/**
 * A set of parsed modules handed to the validator.
 *
 * Several entries may claim the same module name; each entry is validated
 * as its own module.
 */
export interface ModuleGraph {
  /** Name of the module the graph was loaded for, if any. */
  readonly root?: string;
  readonly modules: readonly Module[];
}

export function primitiveType(primitive: Primitive): PrimitiveType {
  return { kind: 'Primitive', primitive };
}

export function fixedType(size: number): FixedType {
  return { kind: 'Fixed', size };
}

export function arrayType(element: Type): ArrayType {
  return { kind: 'Array', element };
}

export function mapType(value: Type): MapType {
  return { kind: 'Map', value };
}

export function optionalType(element: Type): OptionalType {
  return { kind: 'Optional', element };
}

export function referenceType(name: Name): ReferenceType {
  return { kind: 'Reference', name };
}

export function recordType(name: Name, fields: readonly Field[]): RecordType {
  return { kind: 'Record', name, fields };
}

export function variantType(name: Name, cases: readonly Case[]): VariantType {
  return { kind: 'Variant', name, cases };
}

export function enumType(name: Name, symbols: readonly string[]): EnumType {
  return { kind: 'Enum', name, symbols };
}

export function newtypeType(name: Name, underlying: Type): NewtypeType {
  return { kind: 'Newtype', name, underlying };
}

/**
 * Builds a field, leaving `doc` out when there is none.
 */
export function createField(name: string, type: Type, doc?: Doc): Field {
  return doc === undefined ? { name, type } : { name, doc, type };
}

/**
 * Builds a variant case, leaving `doc` out when there is none.
 */
export function createCase(name: Name, fields: readonly Field[], doc?: Doc): Case {
  return doc === undefined ? { name, fields } : { name, doc, fields };
}

/**
 * Builds a definition, leaving `doc` out when there is none.
 */
export function createDefinition(name: Name, type: Type, doc?: Doc): Definition {
  return doc === undefined ? { name, type } : { name, doc, type };
}

/**
 * Collects the modules a module statement list imports and the
 * definitions it declares.
 */
export function createModule(
  metadata: Metadata,
  statements: readonly Statement[],
  source?: string
): Module {
  const imports: string[] = [];
  const definitions: Definition[] = [];
  for (const statement of statements) {
    if (statement.kind === 'Import') {
      imports.push(statement.moduleName);
    } else {
      definitions.push(statement.definition);
    }
  }
  const module: Module = { name: metadata.moduleName, metadata, imports, definitions };
  return source === undefined ? module : { ...module, source };
}
