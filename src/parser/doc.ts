/**
 * Documentation comments.
 *
 * Two forms are recognized: `/** ... *\/` blocks and runs of `///` lines.
 * A documentation comment is only valid directly in front of a
 * definition, a record field or a variant case; the rules that accept one
 * call {@link optionalDoc} and everything else treats it as unexpected
 * input, so an orphaned comment always fails the parse.
 *
 * @packageDocumentation
 */

import type { Doc } from '../types/types.js';
import type { Input } from './input.js';

/**
 * Width of the leading whitespace of a line.
 */
function indentation(line: string): number {
  const match = /^[ \t]*/.exec(line);
  return match === null ? 0 : match[0].length;
}

/**
 * Normalizes the text between `/**` and `*\/`.
 *
 * The first line is trimmed. Continuation lines lose their common
 * indentation and an optional leading `*` (plus one space). Trailing
 * whitespace is dropped from every line and from the result as a whole.
 *
 * @example
 * ```typescript
 * normalizeBlockDoc(' Some\n * documentation.\n ');
 * // "Some\ndocumentation."
 * ```
 */
export function normalizeBlockDoc(content: string): Doc {
  const [first = '', ...rest] = content.split(/\r?\n/);
  const indents = rest.filter((line) => line.trim() !== '').map(indentation);
  const common = indents.length === 0 ? 0 : Math.min(...indents);

  const continuation = rest.map((line) => {
    const dedented = line.trim() === '' ? '' : line.slice(common);
    const unstarred = dedented.startsWith('*') ? dedented.slice(1).replace(/^ /, '') : dedented;
    return unstarred.trimEnd();
  });

  return [first.trim(), ...continuation].join('\n').trim();
}

/**
 * Normalizes the text of consecutive `///` lines (markers already removed).
 */
export function normalizeLineDoc(lines: readonly string[]): Doc {
  return lines
    .map((line) => line.trim())
    .join('\n')
    .trim();
}

function blockDoc(input: Input): Doc {
  const start = input.offset;
  const end = input.source.indexOf('*/', start + 3);
  if (end === -1) {
    input.failWith('unterminated documentation comment', start);
  }
  input.offset = end + 2;
  return normalizeBlockDoc(input.source.slice(start + 3, end));
}

function lineDoc(input: Input): Doc {
  const lines: string[] = [];
  while (input.atLineDoc()) {
    input.offset += 3;
    lines.push(input.skipLine());
    // A blank line ends the run.
    while (/^[ \t\r]$/.test(input.peek() ?? '')) {
      input.offset += 1;
    }
  }
  return normalizeLineDoc(lines);
}

/**
 * Parses a documentation comment at the cursor, if there is one, along
 * with the whitespace and ordinary comments after it.
 */
export function optionalDoc(input: Input): Doc | undefined {
  let doc: Doc;
  if (input.atBlockDoc()) {
    doc = blockDoc(input);
  } else if (input.atLineDoc()) {
    doc = lineDoc(input);
  } else {
    return undefined;
  }
  input.skipSpace();
  return doc;
}
