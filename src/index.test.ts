import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  ThetaException,
  VERSION,
  createName,
  parseModule,
  printType,
  renderError,
  unwrap,
  validateModule,
} from './index.js';

const HEADER_1_0 = 'language-version: 1.0.0\nencoding-version: 1.0.0\n---\n';
const HEADER_1_1 = 'language-version: 1.1.0\nencoding-version: 1.0.0\n---\n';

describe('Theta', () => {
  describe('VERSION', () => {
    it('should follow semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('should match package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  describe('public API', () => {
    it('should parse and validate a module end to end', () => {
      const module = unwrap(
        parseModule(
          HEADER_1_1 +
            [
              '/** A playing card. */',
              'type Card = { suit: Suit, rank: Int }',
              '',
              'enum Suit = Hearts | Diamonds | Clubs | Spades',
              '',
              'alias Hand = [Card]',
            ].join('\n'),
          'cards'
        )
      );

      expect(module.definitions.map((definition) => definition.name)).toEqual([
        createName('cards', 'Card'),
        createName('cards', 'Suit'),
        createName('cards', 'Hand'),
      ]);
      expect(module.definitions[0]?.doc).toBe('A playing card.');
      expect(module.definitions.map((definition) => printType(definition.type))).toEqual([
        'cards.Card',
        'cards.Suit',
        '[cards.Card]',
      ]);
      expect(validateModule(module).success).toBe(true);
    });

    it('should render version errors with the offending line', () => {
      const result = parseModule(HEADER_1_0 + 'enum Suit = Hearts | Spades\n', 'cards');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(renderError(result.error)).toBe(
          [
            '<input>:4:1:',
            '  |',
            '4 | enum Suit = Hearts | Spades',
            '  | ^',
            '`enum` requires language-version ≥ 1.1.0 but this module has language-version 1.0.0.',
          ].join('\n')
        );
      }
    });

    it('should throw ThetaException from unwrap on failure', () => {
      expect(() => unwrap(parseModule(HEADER_1_1, 'bad..name'))).toThrow(ThetaException);
      expect(() => unwrap(parseModule(HEADER_1_1, 'bad..name'))).toThrow(
        'Syntax error: ‘bad..name’ is not a valid Theta name.'
      );
    });
  });

  describe('property-based tests', () => {
    it('should accept an empty body for every supported language version', () => {
      fc.assert(
        fc.property(fc.constantFrom('1.0.0', '1.1.0', '1.1.7'), (version) => {
          const result = parseModule(
            `language-version: ${version}\nencoding-version: 1.0.0\n---\n`,
            'empty'
          );
          expect(result.success).toBe(true);
        })
      );
    });
  });
});
