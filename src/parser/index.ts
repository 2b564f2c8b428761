/**
 * Theta grammar: metadata header, type expressions, definitions with
 * documentation, and module bodies.
 *
 * @packageDocumentation
 */

export {
  DEFAULT_SOURCE_NAME,
  parseDefinition,
  parseMetadata,
  parseModule,
  parseModuleBody,
  parseStatement,
  parseType,
} from './parser.js';
export type { ParseOptions } from './parser.js';
export { createParseContext, isReserved, primitiveKeyword, qualify } from './context.js';
export type { ParseContext } from './context.js';
export { normalizeBlockDoc, normalizeLineDoc } from './doc.js';
export { SEPARATOR } from './metadata.js';
export { MAX_NESTING_DEPTH } from './type-expression.js';
