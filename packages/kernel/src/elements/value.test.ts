import { describe, it, expect } from 'vitest';
import { Value, literal, reference } from './value.js';

describe('Value', () => {
  describe('construction', () => {
    it('should treat plain strings as literals', () => {
      const value = Value.from(['a', reference('b')]);

      expect(value.fragments).toEqual([
        { kind: 'literal', text: 'a' },
        { kind: 'reference', name: 'b' },
      ]);
      expect(value.length).toBe(2);
    });

    it('should copy fragments handed to it', () => {
      const parts = [literal('a')];
      const value = Value.from(parts);
      parts.push(literal('b'));

      expect(value.length).toBe(1);
    });

    it('should report atomicity and references', () => {
      expect(Value.literal('x').isAtomic()).toBe(true);
      expect(new Value().isAtomic()).toBe(true);
      expect(Value.from(['x', 'y']).isAtomic()).toBe(false);
      expect(Value.from(['x']).hasReferences()).toBe(false);
      expect(Value.from([reference('x')]).hasReferences()).toBe(true);
    });
  });

  describe('rendering', () => {
    it('should render a lone literal as its text', () => {
      expect(Value.literal('Hello').toString()).toBe('Hello');
    });

    it('should render a lone reference as its name', () => {
      expect(Value.from([reference('acm')]).toString()).toBe('acm');
    });

    it('should render concatenations with #', () => {
      const value = Value.from(['a', reference('b'), 'c']);

      expect(value.toString()).toBe('"a" # b # "c"');
      expect(value.toBibtex()).toBe('"a" # b # "c"');
    });

    it('should brace literals containing quotes inside concatenations', () => {
      expect(Value.from(['say "hi"', reference('x')]).toString()).toBe('{say "hi"} # x');
    });

    it('should delimit a lone literal in source form', () => {
      expect(Value.literal('x').toBibtex()).toBe('{x}');
      expect(Value.literal('x').toBibtex('quotes')).toBe('"x"');
      expect(Value.literal('say "hi"').toBibtex('quotes')).toBe('{say "hi"}');
      expect(new Value().toBibtex()).toBe('{}');
    });

    it('should not delimit a lone reference in source form', () => {
      expect(Value.from([reference('jan')]).toBibtex()).toBe('jan');
    });

    it('should serialize to its fragments', () => {
      expect(JSON.stringify(Value.from(['a']))).toBe('[{"kind":"literal","text":"a"}]');
    });
  });

  describe('replace', () => {
    it('should substitute known references and keep unknown ones', () => {
      const value = Value.from([reference('a'), ' ', reference('b')]);

      const replaced = value.replace((name) => (name === 'a' ? Value.literal('Hello,') : undefined));

      expect(replaced).toBe(1);
      expect(value.fragments).toEqual([
        { kind: 'literal', text: 'Hello,' },
        { kind: 'literal', text: ' ' },
        { kind: 'reference', name: 'b' },
      ]);
    });

    it('should splice in the target fragments as they are now', () => {
      const target = Value.from([reference('inner'), 'x']);
      const value = Value.from([reference('outer')]);

      value.replace(() => target);
      target.replace(() => Value.literal('resolved'));

      expect(value.fragments).toEqual([
        { kind: 'reference', name: 'inner' },
        { kind: 'literal', text: 'x' },
      ]);
    });

    it('should return 0 when there is nothing to replace', () => {
      expect(Value.literal('x').replace(() => Value.literal('y'))).toBe(0);
    });
  });

  describe('join', () => {
    it('should merge runs of adjacent literals', () => {
      const value = Value.from(['a', 'b', reference('c'), 'd', 'e']);

      value.join();

      expect(value.fragments).toEqual([
        { kind: 'literal', text: 'ab' },
        { kind: 'reference', name: 'c' },
        { kind: 'literal', text: 'de' },
      ]);
    });

    it('should leave a fully literal value atomic', () => {
      const value = Value.from(['Hello', ', ', 'World']);

      value.join();

      expect(value.isAtomic()).toBe(true);
      expect(value.toString()).toBe('Hello, World');
    });
  });
});
