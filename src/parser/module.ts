/**
 * Module bodies: statements until the end of the input.
 *
 * @packageDocumentation
 */

import type { Statement } from '../types/types.js';
import type { ParseContext } from './context.js';
import { statement } from './definition.js';
import type { Input } from './input.js';

/**
 * Parses statements until the end of the input. Anything left over,
 * including a documentation comment with nothing after it, fails the
 * parse.
 */
export function moduleBody(input: Input, context: ParseContext): Statement[] {
  const statements: Statement[] = [];
  input.skipSpace();
  while (!input.atEnd) {
    statements.push(statement(input, context));
  }
  return statements;
}
