/**
 * The closed set of errors Theta operations report.
 *
 * Every layer (metadata, grammar, validator, loader) reports failures as a
 * {@link ThetaError}. Target-specific subsystems add their own errors through
 * the `Target` variant without this taxonomy having to enumerate them.
 *
 * @packageDocumentation
 */

import type { Metadata, Version, VersionRange } from '../metadata/types.js';
import type { Name } from '../names/name.js';

/**
 * A location in module source text. Lines and columns are 1-based.
 */
export interface SourcePosition {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}

/**
 * What went wrong at a parse error's position.
 *
 * - `unexpected`: the input did not match any expected token
 * - `message`: a grammar rule failed with its own explanation
 * - `version`: a construct needs a newer language version than the module declares
 */
export type ParseDiagnostic =
  | {
      readonly kind: 'unexpected';
      /** Rendered description of what was found, e.g. `'?'` or `end of input`. */
      readonly found: string;
      readonly expected: readonly string[];
    }
  | {
      readonly kind: 'message';
      readonly message: string;
    }
  | {
      readonly kind: 'version';
      readonly feature: string;
      readonly required: Version;
      readonly actual: Version;
      readonly message: string;
    };

/**
 * Validation errors for a module that parsed successfully.
 */
export type ModuleError =
  | {
      /** A record lists the same field name more than once. */
      readonly kind: 'DuplicateRecordField';
      readonly record: Name;
      readonly field: string;
    }
  | {
      /** A variant lists the same case name more than once. */
      readonly kind: 'DuplicateCaseName';
      readonly variant: Name;
      readonly caseName: Name;
    }
  | {
      /** One case of a variant lists the same field name more than once. */
      readonly kind: 'DuplicateCaseField';
      readonly variant: Name;
      readonly caseName: Name;
      readonly field: string;
    }
  | {
      /** A reference does not resolve to any definition the module can see. */
      readonly kind: 'UndefinedType';
      readonly name: Name;
    }
  | {
      /**
       * A fully-qualified name is defined more than once in the graph. Types,
       * fields and variant cases do not share a namespace.
       */
      readonly kind: 'DuplicateTypeName';
      readonly name: Name;
    };

/**
 * Identifies the module a validation error belongs to.
 */
export interface ModuleRef {
  readonly name: string;
  /** File the module was read from, when known. */
  readonly source?: string;
}

/**
 * One validation error together with its module.
 */
export interface ModuleViolation {
  readonly module: ModuleRef;
  readonly error: ModuleError;
}

/**
 * An error produced by a target-specific subsystem (an encoder, a code
 * generator). The core only needs to be able to show and render it.
 */
export interface TargetError {
  /** Short single-line description, for logs. */
  show(): string;
  /** Human-readable, possibly multi-line description. */
  pretty(): string;
}

/**
 * Errors encountered when working with Theta definitions.
 */
export type ThetaError =
  | {
      readonly kind: 'ParseError';
      /** Name of the input, e.g. a file path or `<input>`. */
      readonly sourceName: string;
      /** Full source text, kept so renderers can show the offending line. */
      readonly source: string;
      readonly position: SourcePosition;
      readonly diagnostic: ParseDiagnostic;
    }
  | {
      readonly kind: 'IOError';
      readonly path: string;
      readonly message: string;
      readonly code?: string;
    }
  | {
      /** A module requires a language or encoding version this release does not support. */
      readonly kind: 'UnsupportedVersion';
      readonly metadata: Metadata;
      readonly range: VersionRange;
      readonly version: Version;
    }
  | {
      /** Every validation error of every invalid module in a graph. */
      readonly kind: 'InvalidModule';
      readonly errors: readonly ModuleViolation[];
    }
  | {
      readonly kind: 'InvalidName';
      readonly text: string;
    }
  | {
      /** A name without a module part where one is required. */
      readonly kind: 'UnqualifiedName';
      readonly text: string;
    }
  | {
      readonly kind: 'MissingModule';
      readonly searchPath: string;
      readonly moduleName: string;
    }
  | {
      readonly kind: 'MissingName';
      readonly name: Name;
    }
  | {
      readonly kind: 'Target';
      /** Name of the target, e.g. `Avro`. */
      readonly target: string;
      readonly error: TargetError;
    };

/**
 * Result of a Theta operation.
 */
export type Result<T> =
  | {
      readonly success: true;
      readonly value: T;
    }
  | {
      readonly success: false;
      readonly error: ThetaError;
    };

/**
 * Wraps a value in a successful result.
 */
export function success<T>(value: T): Result<T> {
  return { success: true, value };
}

/**
 * Wraps an error in a failed result.
 */
export function failure<T>(error: ThetaError): Result<T> {
  return { success: false, error };
}

/**
 * Wraps an error specific to a target (Avro, a code generator...) in the
 * shared error channel.
 *
 * @param target - Name of the target raising the error.
 * @param error - The target's own error value.
 */
export function targetError(target: string, error: TargetError): ThetaError {
  return { kind: 'Target', target, error };
}
