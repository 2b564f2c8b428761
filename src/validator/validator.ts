/**
 * Semantic validation of parsed modules.
 *
 * Checks name uniqueness and reference resolution across a whole module
 * graph. Every violation in every module is collected before anything is
 * reported; the result does not depend on the order in which modules or
 * definitions are visited.
 *
 * @packageDocumentation
 */

import {
  failure,
  success,
  type ModuleError,
  type ModuleRef,
  type ModuleViolation,
  type Result,
} from '../errors/types.js';
import { renderModuleError } from '../errors/render.js';
import { renderName, type Name } from '../names/name.js';
import type { Field, Module, ModuleGraph, Type } from '../types/types.js';
import { Logger } from '../utils/logger.js';

/**
 * Options for {@link validateModules}.
 */
export interface ValidateOptions {
  /** Logger for validation events. */
  logger?: Logger;
}

const defaultLogger = new Logger({ component: 'Validator', debugMode: false });

/**
 * Finds the names that occur more than once, each reported once, in order
 * of first duplicate occurrence.
 */
function duplicates(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      repeated.add(name);
    }
    seen.add(name);
  }
  return [...repeated];
}

function fieldNames(fields: readonly Field[]): string[] {
  return fields.map((field) => field.name);
}

/**
 * Indexes modules by module name. Several entries may share a name.
 */
function indexModules(graph: ModuleGraph): Map<string, Module[]> {
  const byName = new Map<string, Module[]>();
  for (const module of graph.modules) {
    const entries = byName.get(module.name) ?? [];
    entries.push(module);
    byName.set(module.name, entries);
  }
  return byName;
}

/**
 * Collects the fully-qualified names a module can refer to: its own
 * definitions and those of every module it imports, transitively.
 */
function visibleNames(module: Module, byName: ReadonlyMap<string, readonly Module[]>): Set<string> {
  const visible = new Set<string>();
  const visited = new Set<string>();
  const pending = [module.name, ...module.imports];

  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    if (visited.has(next)) {
      continue;
    }
    visited.add(next);
    for (const entry of byName.get(next) ?? []) {
      for (const definition of entry.definitions) {
        visible.add(renderName(definition.name));
      }
      pending.push(...entry.imports);
    }
  }
  return visible;
}

/**
 * Walks a type, reporting duplicate fields and cases and unresolved
 * references.
 */
function checkType(type: Type, visible: ReadonlySet<string>, errors: ModuleError[]): void {
  switch (type.kind) {
    case 'Primitive':
    case 'Fixed':
    case 'Enum':
      return;
    case 'Array':
    case 'Optional':
      checkType(type.element, visible, errors);
      return;
    case 'Map':
      checkType(type.value, visible, errors);
      return;
    case 'Newtype':
      checkType(type.underlying, visible, errors);
      return;
    case 'Reference':
      if (!visible.has(renderName(type.name))) {
        errors.push({ kind: 'UndefinedType', name: type.name });
      }
      return;
    case 'Record':
      for (const field of duplicates(fieldNames(type.fields))) {
        errors.push({ kind: 'DuplicateRecordField', record: type.name, field });
      }
      for (const field of type.fields) {
        checkType(field.type, visible, errors);
      }
      return;
    case 'Variant': {
      const caseNames = new Map<string, Name>(
        type.cases.map((variantCase) => [renderName(variantCase.name), variantCase.name])
      );
      for (const caseName of duplicates(type.cases.map((variantCase) => renderName(variantCase.name)))) {
        const name = caseNames.get(caseName);
        if (name !== undefined) {
          errors.push({ kind: 'DuplicateCaseName', variant: type.name, caseName: name });
        }
      }
      for (const variantCase of type.cases) {
        for (const field of duplicates(fieldNames(variantCase.fields))) {
          errors.push({
            kind: 'DuplicateCaseField',
            variant: type.name,
            caseName: variantCase.name,
            field,
          });
        }
        for (const field of variantCase.fields) {
          checkType(field.type, visible, errors);
        }
      }
      return;
    }
  }
}

/**
 * Counts how many times each fully-qualified name is defined across the
 * whole graph.
 */
function countDefinitions(graph: ModuleGraph): Map<string, number> {
  const counts = new Map<string, number>();
  for (const module of graph.modules) {
    for (const definition of module.definitions) {
      const key = renderName(definition.name);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Collects every validation error of a single module.
 */
function checkModule(
  module: Module,
  byName: ReadonlyMap<string, readonly Module[]>,
  counts: ReadonlyMap<string, number>
): ModuleError[] {
  const errors: ModuleError[] = [];
  const visible = visibleNames(module, byName);

  const reported = new Set<string>();
  for (const definition of module.definitions) {
    const key = renderName(definition.name);
    if ((counts.get(key) ?? 0) > 1 && !reported.has(key)) {
      reported.add(key);
      errors.push({ kind: 'DuplicateTypeName', name: definition.name });
    }
  }

  for (const definition of module.definitions) {
    checkType(definition.type, visible, errors);
  }

  return dedupe(errors);
}

/**
 * Drops repeated reports of the same error (a type referenced twice is
 * undefined once).
 */
function dedupe(errors: readonly ModuleError[]): ModuleError[] {
  const seen = new Set<string>();
  return errors.filter((error) => {
    const key = `${error.kind}:${renderModuleError(error)}`;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

/**
 * Sort key that makes the violation list independent of traversal order.
 */
function violationKey(violation: ModuleViolation): string {
  const { module, error } = violation;
  return [module.name, module.source ?? '', error.kind, renderModuleError(error)].join('\u0000');
}

/**
 * Collects every validation error in the graph, paired with its module.
 *
 * @returns Violations sorted by module, then by error; empty if the graph is valid.
 */
export function collectViolations(graph: ModuleGraph): ModuleViolation[] {
  const byName = indexModules(graph);
  const counts = countDefinitions(graph);

  const violations: ModuleViolation[] = [];
  for (const module of graph.modules) {
    const ref: ModuleRef =
      module.source === undefined ? { name: module.name } : { name: module.name, source: module.source };
    for (const error of checkModule(module, byName, counts)) {
      violations.push({ module: ref, error });
    }
  }

  return violations.sort((a, b) => {
    const keyA = violationKey(a);
    const keyB = violationKey(b);
    return keyA < keyB ? -1 : keyA > keyB ? 1 : 0;
  });
}

/**
 * Validates a module graph.
 *
 * @param graph - Parsed modules, assembled by a loader.
 * @returns The graph unchanged, or an `InvalidModule` error listing every
 * violation of every module.
 *
 * @example
 * ```typescript
 * const result = validateModules({ modules: [module] });
 * if (!result.success) {
 *   console.error(renderError(result.error));
 * }
 * ```
 */
export function validateModules(graph: ModuleGraph, options: ValidateOptions = {}): Result<ModuleGraph> {
  const logger = options.logger ?? defaultLogger;
  const violations = collectViolations(graph);

  if (violations.length > 0) {
    logger.warn('validation_failed', {
      modules: graph.modules.length,
      violations: violations.length,
    });
    return failure({ kind: 'InvalidModule', errors: violations });
  }

  logger.debug('validation_passed', { modules: graph.modules.length });
  return success(graph);
}

/**
 * Validates a single module on its own, as a graph of one.
 */
export function validateModule(module: Module, options: ValidateOptions = {}): Result<Module> {
  const result = validateModules({ root: module.name, modules: [module] }, options);
  return result.success ? success(module) : failure(result.error);
}
