import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@bibkit/shared';
import {
  DEFAULT_STRING_INCLUDE,
  pickParseOptions,
  resolveInclude,
  resolveParseOptions,
  type StringOptions,
} from './options.js';

describe('options', () => {
  describe('resolveInclude', () => {
    it('should default to constants, preambles and entries', () => {
      expect(resolveInclude()).toEqual(['string', 'preamble', 'entry']);
      expect(resolveInclude({})).toBe(DEFAULT_STRING_INCLUDE);
    });

    it('should pass known kinds through', () => {
      expect(resolveInclude({ include: ['entry'] })).toEqual(['entry']);
    });

    it('should reject unknown kinds', () => {
      const options: StringOptions = JSON.parse('{"include":["entry","article"]}');

      expect(() => resolveInclude(options)).toThrow(ConfigurationError);
      expect(() => resolveInclude(options)).toThrow('Unknown element kind(s): article');
    });
  });

  describe('resolveParseOptions', () => {
    it('should fill in defaults', () => {
      expect(resolveParseOptions()).toEqual({
        includeErrors: true,
        includeMetaContent: true,
        allowMissingKeys: false,
      });
    });

    it('should keep explicit values', () => {
      expect(resolveParseOptions({ includeErrors: false, allowMissingKeys: true })).toEqual({
        includeErrors: false,
        includeMetaContent: true,
        allowMissingKeys: true,
      });
    });
  });

  it('should pick only parse options', () => {
    const options = { includeMetaContent: false, logger: 'ignored', path: 'x.bib' };

    expect(pickParseOptions(options)).toEqual({ includeMetaContent: false });
  });
});
