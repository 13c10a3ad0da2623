import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createLogger } from '@bibkit/shared';
import { Bibliography } from '@bibkit/kernel';
import { createBibtexParser } from './parser.js';

const parser = createBibtexParser({ logger: createLogger({ level: 'error' }) });

describe('createBibtexParser', () => {
  it('should keep valid entries reachable next to a broken fragment', () => {
    const bibliography = parser.parse(
      [
        '@article{good, author = {A}, title = {T}, journal = {J}, year = 2020}',
        '@book{broken, title = {Unclosed',
        '@misc{after, note = {N}}',
      ].join('\n'),
    );

    expect(bibliography.hasErrors()).toBe(true);
    expect(bibliography.isValid()).toBe(false);
    expect(bibliography.errors).toHaveLength(1);
    expect(bibliography.get('good')?.type).toBe('article');
    expect(bibliography.get('after')?.get('note')?.toString()).toBe('N');
  });

  it('should round-trip and resolve string constants', () => {
    const source = [
      '@string{ acm = "ACM Press" }',
      '@book{knuth,',
      '  title = {The Art},',
      '  publisher = acm # " Inc.",',
      '  year = 1968',
      '}',
      '',
    ].join('\n');

    const bibliography = parser.parse(source);

    expect(bibliography.toString()).toBe(
      '@string{ acm = "ACM Press" }\n@book{knuth,\n  title = {The Art},\n  publisher = acm # " Inc.",\n  year = {1968}\n}\n',
    );
    expect(bibliography.replaceStrings()).toEqual({ visited: 2, replaced: 1 });
    bibliography.joinStrings();
    expect(bibliography.get('knuth')?.get('publisher')?.toString()).toBe('ACM Press Inc.');
  });

  it('should attach parsed elements to the bibliography it builds', () => {
    const bibliography = parser.parse('@misc{k}');

    expect(bibliography.get('k')?.bibliography).toBe(bibliography);
  });

  it('should validate entry types named like object members', () => {
    const bibliography = parser.parse('@constructor{c, title = {T}}\n@__proto__{p}\n');

    expect(bibliography.get('c')?.type).toBe('constructor');
    expect(bibliography.isValid()).toBe(true);
  });

  describe('opening files', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'bibkit-parser-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should parse files with the given options', () => {
      const path = join(dir, 'refs.bib');
      writeFileSync(path, '% generated\n@misc{k, note = {N}}\n', 'utf-8');

      const bibliography = Bibliography.open(path, { parser, includeMetaContent: false });

      expect(bibliography.path).toBe(path);
      expect(bibliography.metaComments).toEqual([]);
      expect(bibliography.toString()).toBe('@misc{k,\n  note = {N}\n}\n');
    });
  });
});
