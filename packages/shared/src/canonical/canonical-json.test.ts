import { describe, it, expect } from 'vitest';
import { canonicalStringify, structurallyEqual } from './canonical-json.js';

describe('canonicalStringify', () => {
  it('should sort object keys recursively', () => {
    expect(canonicalStringify({ b: 1, a: { d: 2, c: 3 } })).toBe('{"a":{"c":3,"d":2},"b":1}');
  });

  it('should keep array order and drop undefined properties', () => {
    expect(canonicalStringify({ list: [3, 1, 2], gone: undefined })).toBe('{"list":[3,1,2]}');
  });
});

describe('structurallyEqual', () => {
  it('should ignore key order', () => {
    expect(structurallyEqual({ key: 'a', type: 'book' }, { type: 'book', key: 'a' })).toBe(true);
  });

  it('should detect differing values', () => {
    expect(structurallyEqual({ key: 'a' }, { key: 'b' })).toBe(false);
  });
});
