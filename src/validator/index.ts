/**
 * Semantic validation of module graphs.
 *
 * @packageDocumentation
 */

export { collectViolations, validateModule, validateModules } from './validator.js';
export type { ValidateOptions } from './validator.js';
