import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { EnvCoercionError, readEnvOverrides, applyEnvOverrides } from './env.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    describe('THETA_* env vars override corresponding config values', () => {
      it('should split THETA_LOAD_PATH on colons', () => {
        const result = readEnvOverrides({ THETA_LOAD_PATH: 'schemas:vendor/schemas' });

        expect(result).toEqual({ paths: { load_path: ['schemas', 'vendor/schemas'] } });
      });

      it('should drop empty load path segments', () => {
        const result = readEnvOverrides({ THETA_LOAD_PATH: ':a:: b :' });

        expect(result.paths?.load_path).toEqual(['a', 'b']);
      });

      it('should read THETA_PATHS_EXTENSION as a string', () => {
        const result = readEnvOverrides({ THETA_PATHS_EXTENSION: '.th' });

        expect(result.paths?.extension).toBe('.th');
      });

      it('should read THETA_DEBUG with boolean coercion', () => {
        const result = readEnvOverrides({ THETA_DEBUG: 'yes' });

        expect(result.logging?.debug).toBe(true);
      });

      it('should ignore unset env vars', () => {
        const result = readEnvOverrides({ HOME: '/home/test' });

        expect(result).toEqual({});
      });

      it('should ignore empty string env vars', () => {
        const result = readEnvOverrides({ THETA_LOAD_PATH: '', THETA_DEBUG: '' });

        expect(result).toEqual({});
      });

      it('should let THETA_LOGGING_DEBUG win over the THETA_DEBUG shortcut', () => {
        const result = readEnvOverrides({ THETA_DEBUG: 'true', THETA_LOGGING_DEBUG: 'off' });

        expect(result).toEqual({ logging: { debug: false } });
      });
    });

    describe('boolean coercion', () => {
      for (const val of ['true', 'TRUE', '1', 'yes', 'on']) {
        it(`should coerce '${val}' to true`, () => {
          expect(readEnvOverrides({ THETA_DEBUG: val }).logging?.debug).toBe(true);
        });
      }

      for (const val of ['false', 'False', '0', 'no', 'off']) {
        it(`should coerce '${val}' to false`, () => {
          expect(readEnvOverrides({ THETA_DEBUG: val }).logging?.debug).toBe(false);
        });
      }

      it('should handle whitespace in boolean strings', () => {
        expect(readEnvOverrides({ THETA_DEBUG: '  on ' }).logging?.debug).toBe(true);
      });
    });

    describe('coercion errors', () => {
      it('should throw EnvCoercionError for invalid boolean', () => {
        expect(() => readEnvOverrides({ THETA_DEBUG: 'maybe' })).toThrow(EnvCoercionError);
        expect(() => readEnvOverrides({ THETA_DEBUG: 'maybe' })).toThrow(
          "Cannot coerce 'THETA_DEBUG' value 'maybe' to boolean. Expected one of: true, 1, yes, on, false, 0, no, off"
        );
      });

      it('should throw EnvCoercionError for a load path with no directories', () => {
        expect(() => readEnvOverrides({ THETA_LOAD_PATH: ': :' })).toThrow(
          "Empty load path in 'THETA_LOAD_PATH'"
        );
      });

      it('should reject an extension without a leading dot', () => {
        expect(() => readEnvOverrides({ THETA_PATHS_EXTENSION: 'theta' })).toThrow(
          "Invalid value for 'THETA_PATHS_EXTENSION': must start with '.', got 'theta'"
        );
      });

      it('should report which variable failed', () => {
        let caught: unknown;
        try {
          readEnvOverrides({ THETA_PATHS_EXTENSION: 'theta' });
        } catch (error) {
          caught = error;
        }

        expect(caught).toBeInstanceOf(EnvCoercionError);
        expect(caught).toMatchObject({ envVar: 'THETA_PATHS_EXTENSION', rawValue: 'theta' });
      });
    });
  });

  describe('applyEnvOverrides', () => {
    it('should merge env overrides with config', () => {
      const config = applyEnvOverrides(DEFAULT_CONFIG, { THETA_LOAD_PATH: 'schemas' });

      expect(config.paths).toEqual({ load_path: ['schemas'], extension: '.theta' });
      expect(config.logging).toEqual({ debug: false });
    });

    it('should demonstrate override precedence: env > config file', () => {
      const fileConfig = parseConfig(`
[paths]
load_path = ["from-file"]
extension = ".file"

[logging]
debug = true
`);
      const config = applyEnvOverrides(fileConfig, {
        THETA_PATHS_EXTENSION: '.env',
        THETA_LOGGING_DEBUG: 'false',
      });

      expect(config.paths.load_path).toEqual(['from-file']);
      expect(config.paths.extension).toBe('.env');
      expect(config.logging.debug).toBe(false);
    });

    it('should not modify the base configuration', () => {
      applyEnvOverrides(DEFAULT_CONFIG, { THETA_DEBUG: '1' });

      expect(DEFAULT_CONFIG.logging.debug).toBe(false);
    });
  });

  describe('EnvCoercionError', () => {
    it('should have correct error name', () => {
      expect(new EnvCoercionError('THETA_DEBUG', 'x', 'boolean').name).toBe('EnvCoercionError');
    });

    it('should include env var info in default message', () => {
      const error = new EnvCoercionError('THETA_DEBUG', 'x', 'boolean');

      expect(error.message).toBe("Cannot coerce environment variable 'THETA_DEBUG' value 'x' to boolean");
      expect(error.envVar).toBe('THETA_DEBUG');
      expect(error.rawValue).toBe('x');
      expect(error.expectedType).toBe('boolean');
    });

    it('should use custom message when provided', () => {
      expect(new EnvCoercionError('THETA_DEBUG', 'x', 'boolean', 'custom').message).toBe('custom');
    });
  });

  describe('property-based tests', () => {
    it('should split any colon-joined list back into its directories', () => {
      fc.assert(
        fc.property(
          fc.array(fc.stringMatching(/^[a-z0-9_./-]{1,12}$/), { minLength: 1, maxLength: 6 }),
          (directories) => {
            const result = readEnvOverrides({ THETA_LOAD_PATH: directories.join(':') });
            expect(result.paths?.load_path).toEqual(directories);
          }
        )
      );
    });

    it('should always preserve extension values exactly', () => {
      fc.assert(
        fc.property(fc.stringMatching(/^\.[a-z]{1,8}$/), (extension) => {
          const result = readEnvOverrides({ THETA_PATHS_EXTENSION: extension });
          expect(result.paths?.extension).toBe(extension);
        })
      );
    });
  });
});
