import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import type { Result } from '../errors/types.js';
import { renderError } from '../errors/render.js';
import { createVersion } from '../metadata/version.js';
import { createName } from '../names/name.js';
import {
  arrayType,
  createCase,
  createDefinition,
  createField,
  enumType,
  fixedType,
  newtypeType,
  optionalType,
  primitiveType,
  recordType,
  referenceType,
  variantType,
  type Definition,
  type Statement,
} from '../types/types.js';
import { createParseContext, type ParseContext } from './context.js';
import { parseDefinition, parseModuleBody, parseStatement } from './parser.js';

function contextAt(major: number, minor: number, patch: number): ParseContext {
  return createParseContext({
    languageVersion: createVersion(major, minor, patch),
    encodingVersion: createVersion(1, 0, 0),
    moduleName: 'test',
  });
}

const v1_0 = contextAt(1, 0, 0);
const v1_1 = contextAt(1, 1, 0);

const foo = createName('test', 'Foo');
const int = primitiveType('Int');
const string = primitiveType('String');

function parsed<T>(value: T): Result<T> {
  return { success: true, value };
}

function definitionStatement(definition: Definition): Statement {
  return { kind: 'Definition', definition };
}

describe('Definitions', () => {
  describe('enums', () => {
    it('should parse one symbol', () => {
      expect(parseDefinition('enum Foo = Bar', v1_1)).toEqual(
        parsed(createDefinition(foo, enumType(foo, ['Bar'])))
      );
    });

    it('should parse several symbols', () => {
      expect(parseDefinition('enum Foo = Bar | Baz', v1_1)).toEqual(
        parsed(createDefinition(foo, enumType(foo, ['Bar', 'Baz'])))
      );
      expect(parseDefinition('enum Foo = Bar | baz | _Baz', v1_1)).toEqual(
        parsed(createDefinition(foo, enumType(foo, ['Bar', 'baz', '_Baz'])))
      );
    });

    it('should parse for every language version from 1.1.0', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 100 }), (patch) => {
          expect(parseDefinition('enum Foo = Bar | Baz', contextAt(1, 1, patch)).success).toBe(true);
        })
      );
    });
  });

  describe('records', () => {
    it('should parse an empty record', () => {
      expect(parseDefinition('type Foo = {\n}\n', v1_0)).toEqual(
        parsed(createDefinition(foo, recordType(foo, [])))
      );
    });

    it('should parse one field', () => {
      expect(parseDefinition('type Foo = {\n  foo : Int?\n}\n', v1_0)).toEqual(
        parsed(createDefinition(foo, recordType(foo, [createField('foo', optionalType(int))])))
      );
    });

    it('should parse two fields', () => {
      expect(parseDefinition('type Foo = {\n  foo : Int?,\n  bar : test2.Foo\n}\n', v1_0)).toEqual(
        parsed(
          createDefinition(
            foo,
            recordType(foo, [
              createField('foo', optionalType(int)),
              createField('bar', referenceType(createName('test2', 'Foo'))),
            ])
          )
        )
      );
    });

    it('should parse date fields', () => {
      expect(parseDefinition('type Foo = {\n  foo : Date?,\n  bar : Datetime\n}\n', v1_0)).toEqual(
        parsed(
          createDefinition(
            foo,
            recordType(foo, [
              createField('foo', optionalType(primitiveType('Date'))),
              createField('bar', primitiveType('Datetime')),
            ])
          )
        )
      );
    });

    it('should parse Fixed fields', () => {
      expect(parseDefinition('type Foo = {\n  foo : Fixed(100)?,\n  bar : Fixed(96)\n}\n', v1_1)).toEqual(
        parsed(
          createDefinition(
            foo,
            recordType(foo, [
              createField('foo', optionalType(fixedType(100))),
              createField('bar', fixedType(96)),
            ])
          )
        )
      );
    });

    it('should reject a trailing comma', () => {
      expect(parseDefinition('type Foo = { foo : Int, }', v1_0).success).toBe(false);
    });
  });

  describe('variants', () => {
    it('should parse a single case with a field block', () => {
      expect(parseDefinition('type Foo = Foo { a : String }', v1_0)).toEqual(
        parsed(createDefinition(foo, variantType(foo, [createCase(foo, [createField('a', string)])])))
      );
      expect(parseDefinition('type Foo = Foo {}', v1_0)).toEqual(
        parsed(createDefinition(foo, variantType(foo, [createCase(foo, [])])))
      );
    });

    it('should parse several cases', () => {
      const bar = createCase(createName('test', 'Bar'), []);
      const withField = createCase(foo, [createField('a', string)]);

      expect(parseDefinition('type Foo = Foo { a : String } | Bar {}', v1_0)).toEqual(
        parsed(createDefinition(foo, variantType(foo, [withField, bar])))
      );

      const three = 'type Foo = Foo { a : String } \n         | Bar {}\n      | Baz { a : Int? }\n';
      const baz = createCase(createName('test', 'Baz'), [createField('a', optionalType(int))]);
      expect(parseDefinition(three, v1_0)).toEqual(
        parsed(createDefinition(foo, variantType(foo, [withField, bar, baz])))
      );
    });

    it('should parse cases without field blocks', () => {
      const bar = createCase(createName('test', 'Bar'), []);
      const baz = createCase(createName('test', 'Baz'), []);
      const qux = createCase(createName('test', 'Qux'), []);

      expect(parseDefinition('type Foo = Bar | Baz', v1_0)).toEqual(
        parsed(createDefinition(foo, variantType(foo, [bar, baz])))
      );
      expect(parseDefinition('type Foo = Bar | Baz { a : Int }', v1_0)).toEqual(
        parsed(
          createDefinition(
            foo,
            variantType(foo, [bar, createCase(createName('test', 'Baz'), [createField('a', int)])])
          )
        )
      );
      expect(parseDefinition('type Foo = Bar | Baz\n\n  | Qux', v1_0)).toEqual(
        parsed(createDefinition(foo, variantType(foo, [bar, baz, qux])))
      );
    });

    it('should reject qualified case names', () => {
      expect(parseDefinition('type Foo = other.Bar | Baz', v1_0).success).toBe(false);
    });
  });

  describe('newtypes and aliases', () => {
    it('should parse a single name without a block as a newtype', () => {
      expect(parseDefinition('type Foo = Bar', v1_0)).toEqual(
        parsed(createDefinition(foo, newtypeType(foo, referenceType(createName('test', 'Bar')))))
      );
    });

    it('should parse a type expression as a newtype', () => {
      expect(parseDefinition('type Foo = [Int]?', v1_0)).toEqual(
        parsed(createDefinition(foo, newtypeType(foo, optionalType(arrayType(int)))))
      );
    });

    it('should give aliases the underlying type directly', () => {
      expect(parseDefinition('alias Foo = [Int]', v1_0)).toEqual(
        parsed(createDefinition(foo, arrayType(int)))
      );
    });
  });

  describe('reserved words', () => {
    it('should reject primitive names as type names', () => {
      expect(parseDefinition('type Int = String', v1_0)).toMatchObject({
        success: false,
        error: {
          position: { offset: 5 },
          diagnostic: { kind: 'message', message: '‘Int’ is a reserved word and cannot be used as a name' },
        },
      });
    });

    it('should reserve Fixed and UUID only from 1.1.0', () => {
      expect(parseDefinition('type UUID = String', v1_0).success).toBe(true);
      expect(parseDefinition('type UUID = String', v1_1)).toMatchObject({
        success: false,
        error: { diagnostic: { message: '‘UUID’ is a reserved word and cannot be used as a name' } },
      });
      expect(parseDefinition('type Fixed = String', v1_1)).toMatchObject({
        success: false,
        error: { diagnostic: { message: '‘Fixed’ is a reserved word and cannot be used as a name' } },
      });
    });
  });

  describe('documentation on types', () => {
    it('should attach docs to newtypes', () => {
      expect(parseModuleBody('/// Foo is an Int!\ntype Foo = Int\n', v1_0)).toEqual(
        parsed([definitionStatement(createDefinition(foo, newtypeType(foo, int), 'Foo is an Int!'))])
      );
    });

    it('should attach docs to aliases', () => {
      expect(parseModuleBody('/** Foo is an Int! */\nalias Foo = Int\n', v1_0)).toEqual(
        parsed([definitionStatement(createDefinition(foo, int, 'Foo is an Int!'))])
      );
    });

    it('should attach docs to enums', () => {
      expect(parseModuleBody('/// Foo is an enum!\nenum Foo = Bar | Baz\n', v1_1)).toEqual(
        parsed([
          definitionStatement(createDefinition(foo, enumType(foo, ['Bar', 'Baz']), 'Foo is an enum!')),
        ])
      );
    });

    it('should attach docs to records and their fields', () => {
      expect(parseModuleBody('/// Foo docs\ntype Foo = { bar : Int }\n', v1_0)).toEqual(
        parsed([
          definitionStatement(createDefinition(foo, recordType(foo, [createField('bar', int)]), 'Foo docs')),
        ])
      );

      const body = [
        'type Foo = {',
        '  /// Bar docs',
        '  bar : Int,',
        '  /** baz',
        '      docs */',
        '  baz : String',
        '}',
        '',
      ].join('\n');
      expect(parseModuleBody(body, v1_0)).toEqual(
        parsed([
          definitionStatement(
            createDefinition(
              foo,
              recordType(foo, [createField('bar', int, 'Bar docs'), createField('baz', string, 'baz\ndocs')])
            )
          ),
        ])
      );
    });

    it('should attach docs to variants and their cases', () => {
      const bar = createCase(createName('test', 'Bar'), []);
      const baz = createCase(createName('test', 'Baz'), []);
      expect(parseModuleBody('/// Foo docs\ntype Foo = Bar | Baz\n', v1_0)).toEqual(
        parsed([definitionStatement(createDefinition(foo, variantType(foo, [bar, baz]), 'Foo docs'))])
      );

      const one = createCase(createName('test', 'One'), [], 'One docs');
      expect(parseModuleBody('type Foo = /** One docs */ One {}\n', v1_0)).toEqual(
        parsed([definitionStatement(createDefinition(foo, variantType(foo, [one])))])
      );

      const body = [
        'type Foo = /** One docs */ One {}',
        '         | /// Two docs',
        '           Two { /** foo docs',
        '                   */',
        '                 foo : Int }',
        '',
      ].join('\n');
      const two = createCase(createName('test', 'Two'), [createField('foo', int, 'foo docs')], 'Two docs');
      expect(parseModuleBody(body, v1_0)).toEqual(
        parsed([definitionStatement(createDefinition(foo, variantType(foo, [one, two])))])
      );
    });

    it('should allow a doc after a comma but not before it', () => {
      expect(parseDefinition('type Foo = { a : Int, /// b docs\n b : Int }', v1_0)).toEqual(
        parsed(
          createDefinition(foo, recordType(foo, [createField('a', int), createField('b', int, 'b docs')]))
        )
      );
      expect(parseDefinition('type Foo = { a : Int /// a docs\n, b : Int }', v1_0).success).toBe(false);
    });

    it('should reject documentation that is not attached to a definition', () => {
      const body = [
        'type TCIN = Long',
        '/// This doc comment is not attached to a definition',
        '/// so it should cause a parse error',
        '',
      ].join('\n');

      expect(parseModuleBody(body, v1_0)).toMatchObject({
        success: false,
        error: { diagnostic: { kind: 'unexpected', found: 'end of input' } },
      });
    });

    it('should reject documentation on an import', () => {
      expect(parseModuleBody('/// docs\nimport foo\n', v1_0).success).toBe(false);
    });
  });

  describe('statements', () => {
    it('should parse imports', () => {
      expect(parseStatement('import com.example.common', v1_0)).toEqual(
        parsed({ kind: 'Import', moduleName: 'com.example.common' })
      );
    });

    it('should not mistake an identifier starting with import for an import', () => {
      expect(parseStatement('imports', v1_0).success).toBe(false);
    });
  });

  describe('backwards compatibility', () => {
    it('should reject enum before 1.1.0 with a version error', () => {
      expect(parseStatement('enum Foo = Bar | Baz', v1_0)).toMatchObject({
        success: false,
        error: {
          position: { offset: 0 },
          diagnostic: {
            kind: 'version',
            feature: 'enum',
            message: '`enum` requires language-version ≥ 1.1.0 but this module has language-version 1.0.0.',
          },
        },
      });
    });

    it('should treat enums as a syntax error rather than a version error', () => {
      const result = parseStatement('enums Foo = Bar | Baz', v1_0);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(renderError(result.error)).toBe(
          [
            '<input>:1:1:',
            '  |',
            '1 | enums Foo = Bar | Baz',
            '  | ^',
            "unexpected 'enums'",
            'expecting alias, import, or type',
          ].join('\n')
        );
      }
    });

    it('should offer enum as an alternative from 1.1.0', () => {
      expect(parseStatement('enums Foo = Bar | Baz', v1_1)).toMatchObject({
        success: false,
        error: { diagnostic: { expected: ['import', 'type', 'alias', 'enum'] } },
      });
    });

    it('should reject Fixed(100) before 1.1.0 with a version error', () => {
      expect(parseStatement('type F = Fixed(100)', v1_0)).toMatchObject({
        success: false,
        error: {
          position: { offset: 9 },
          diagnostic: {
            kind: 'version',
            message: '`Fixed` requires language-version ≥ 1.1.0 but this module has language-version 1.0.0.',
          },
        },
      });
    });

    it('should accept Fixed as a name before 1.1.0', () => {
      const fixed = createName('test', 'Fixed');
      expect(parseStatement('type Fixed = Int', v1_0)).toEqual(
        parsed(definitionStatement(createDefinition(fixed, newtypeType(fixed, int))))
      );
    });

    it('should reject enum for every 1.0.x version', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 100 }), (patch) => {
          const result = parseStatement('enum Foo = Bar', contextAt(1, 0, patch));
          expect(result.success ? undefined : result.error.kind).toBe('ParseError');
          if (!result.success && result.error.kind === 'ParseError') {
            expect(result.error.diagnostic.kind).toBe('version');
          }
        })
      );
    });
  });
});
