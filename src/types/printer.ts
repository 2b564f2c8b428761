/**
 * Renders types back into Theta syntax.
 *
 * @packageDocumentation
 */

import { renderName } from '../names/name.js';
import type { Type } from './types.js';

/**
 * Renders a type as it would be written in a type expression. Named types
 * (records, variants, enums, newtypes) render as their fully-qualified name.
 *
 * @example
 * ```typescript
 * printType(optionalType(arrayType(primitiveType('String')))); // "[String]?"
 * ```
 */
export function printType(type: Type): string {
  switch (type.kind) {
    case 'Primitive':
      return type.primitive;
    case 'Fixed':
      return `Fixed(${String(type.size)})`;
    case 'Array':
      return `[${printType(type.element)}]`;
    case 'Map':
      return `{${printType(type.value)}}`;
    case 'Optional':
      return `${printType(type.element)}?`;
    case 'Reference':
    case 'Record':
    case 'Variant':
    case 'Enum':
    case 'Newtype':
      return renderName(type.name);
  }
}
