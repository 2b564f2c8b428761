/**
 * Human-readable rendering for Theta errors.
 *
 * @packageDocumentation
 */

import { renderVersion } from '../metadata/version.js';
import { renderName } from '../names/name.js';
import type {
  ModuleError,
  ModuleViolation,
  ParseDiagnostic,
  SourcePosition,
  ThetaError,
} from './types.js';

/**
 * Formats a list of expected items as `a`, `a or b`, or `a, b, or c`.
 */
export function formatExpected(expected: readonly string[]): string {
  const items = [...new Set(expected)].sort();
  if (items.length <= 2) {
    return items.join(' or ');
  }
  const last = items[items.length - 1] ?? '';
  return `${items.slice(0, -1).join(', ')}, or ${last}`;
}

/**
 * Renders the text of a parse diagnostic, without position information.
 */
export function renderDiagnostic(diagnostic: ParseDiagnostic): string {
  switch (diagnostic.kind) {
    case 'unexpected':
      return diagnostic.expected.length === 0
        ? `unexpected ${diagnostic.found}`
        : `unexpected ${diagnostic.found}\nexpecting ${formatExpected(diagnostic.expected)}`;
    case 'message':
    case 'version':
      return diagnostic.message;
  }
}

/**
 * Renders the offending source line with a caret under the error column.
 */
function renderSourceExcerpt(source: string, position: SourcePosition): string {
  const lineText = (source.split('\n')[position.line - 1] ?? '').replace(/\r$/, '');
  const lineNumber = String(position.line);
  const gutter = ' '.repeat(lineNumber.length);
  return [
    `${gutter} |`,
    `${lineNumber} | ${lineText}`,
    `${gutter} | ${' '.repeat(position.column - 1)}^`,
  ].join('\n');
}

/**
 * Renders the message for a single validation error.
 */
export function renderModuleError(error: ModuleError): string {
  switch (error.kind) {
    case 'DuplicateRecordField':
      return `The record ‘${renderName(error.record)}’ has multiple fields called ‘${error.field}’.`;
    case 'DuplicateCaseName':
      return `The variant ‘${renderName(error.variant)}’ has multiple cases called ‘${renderName(error.caseName)}’.`;
    case 'DuplicateCaseField':
      return `The case ‘${renderName(error.caseName)}’ of the variant ‘${renderName(error.variant)}’ has multiple fields called ‘${error.field}’.`;
    case 'UndefinedType':
      return `The type ‘${renderName(error.name)}’ is not defined.`;
    case 'DuplicateTypeName':
      return [
        `The type ‘${renderName(error.name)}’ has been defined multiple times.`,
        '',
        'Fully qualified names have to be globally unique in Theta schemas.',
      ].join('\n');
  }
}

/**
 * Renders a validation error together with the module it comes from.
 */
export function renderModuleViolation(violation: ModuleViolation): string {
  const { module, error } = violation;
  const origin = module.source === undefined ? '' : ` (${module.source})`;
  return `Error in module ‘${module.name}’${origin}:\n${renderModuleError(error)}`;
}

/**
 * Renders any Theta error as multi-line text.
 *
 * @example
 * ```typescript
 * renderError({ kind: 'InvalidName', text: 'foo..Bar' });
 * // "Syntax error: ‘foo..Bar’ is not a valid Theta name."
 * ```
 */
export function renderError(error: ThetaError): string {
  switch (error.kind) {
    case 'ParseError': {
      const { line, column } = error.position;
      return [
        `${error.sourceName}:${String(line)}:${String(column)}:`,
        renderSourceExcerpt(error.source, error.position),
        renderDiagnostic(error.diagnostic),
      ].join('\n');
    }
    case 'IOError':
      return `Could not read ‘${error.path}’: ${error.message}`;
    case 'UnsupportedVersion': {
      const { range } = error;
      return [
        `The ‘${error.metadata.moduleName}’ module requires`,
        '',
        `  ${range.field} = ${renderVersion(error.version)}`,
        '',
        'but this release of Theta only supports',
        '',
        `  ${range.field} ≥ ${renderVersion(range.lower)} and < ${renderVersion(range.upper)}`,
      ].join('\n');
    }
    case 'InvalidModule':
      return [
        'Errors in module definitions:',
        '',
        error.errors.map(renderModuleViolation).join('\n\n'),
      ].join('\n');
    case 'InvalidName':
      return `Syntax error: ‘${error.text}’ is not a valid Theta name.`;
    case 'UnqualifiedName':
      return [
        `‘${error.text}’ does not have a namespace. Please provide`,
        'a fully-qualified name like ‘com.example.Foo’.',
      ].join('\n');
    case 'MissingModule':
      return `The module ‘${error.moduleName}’ was not found in ‘${error.searchPath}’.`;
    case 'MissingName':
      return `Could not find ‘${error.name.localName}’ in module ‘${error.name.moduleName}’.`;
    case 'Target':
      return `Error converting to/from ${error.target}:\n\n${error.error.pretty()}`;
  }
}
