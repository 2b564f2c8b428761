/**
 * Error model: the shared error taxonomy, results and rendering.
 *
 * @packageDocumentation
 */

export { failure, success, targetError } from './types.js';
export type {
  ModuleError,
  ModuleRef,
  ModuleViolation,
  ParseDiagnostic,
  Result,
  SourcePosition,
  TargetError,
  ThetaError,
} from './types.js';
export {
  formatExpected,
  renderDiagnostic,
  renderError,
  renderModuleError,
  renderModuleViolation,
} from './render.js';
export { ThetaException, unwrap } from './exception.js';
