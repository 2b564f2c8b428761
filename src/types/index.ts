/**
 * Abstract type graph: types, definitions, modules and module graphs.
 *
 * @packageDocumentation
 */

export {
  PRIMITIVES,
  arrayType,
  createCase,
  createDefinition,
  createField,
  createModule,
  enumType,
  fixedType,
  mapType,
  newtypeType,
  optionalType,
  primitiveType,
  recordType,
  referenceType,
  variantType,
} from './types.js';
export type {
  ArrayType,
  Case,
  Definition,
  DefinitionStatement,
  Doc,
  EnumType,
  Field,
  FixedType,
  ImportStatement,
  MapType,
  Module,
  ModuleGraph,
  NewtypeType,
  OptionalType,
  Primitive,
  PrimitiveType,
  RecordType,
  ReferenceType,
  Statement,
  Type,
  VariantType,
} from './types.js';
export { printType } from './printer.js';
