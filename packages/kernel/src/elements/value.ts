import type { Fragment, LiteralFragment, ReferenceFragment } from '@bibkit/contracts';

/**
 * Input accepted wherever a value is built: plain strings are literals.
 */
export type ValuePart = string | Fragment;

/**
 * Delimiters used when a single literal is written back as BibTeX source.
 */
export type ValueDelimiter = 'braces' | 'quotes';

/**
 * Build a literal fragment.
 */
export function literal(text: string): LiteralFragment {
  return { kind: 'literal', text };
}

/**
 * Build a reference to a string constant.
 */
export function reference(name: string): ReferenceFragment {
  return { kind: 'reference', name };
}

function toFragment(part: ValuePart): Fragment {
  if (typeof part === 'string') {
    return literal(part);
  }
  return part.kind === 'literal' ? literal(part.text) : reference(part.name);
}

function wrap(text: string, delimiter: ValueDelimiter): string {
  if (delimiter === 'quotes' && !text.includes('"')) {
    return `"${text}"`;
  }
  return `{${text}}`;
}

/**
 * An ordered sequence of literal and macro-reference fragments.
 *
 * Values are mutable: string resolution rewrites them in place.
 */
export class Value {
  private parts: Fragment[];

  constructor(parts: readonly ValuePart[] = []) {
    this.parts = parts.map(toFragment);
  }

  static from(parts: readonly ValuePart[]): Value {
    return new Value(parts);
  }

  static literal(text: string): Value {
    return new Value([text]);
  }

  /**
   * Copy of the current fragments.
   */
  get fragments(): Fragment[] {
    return this.parts.map(toFragment);
  }

  get length(): number {
    return this.parts.length;
  }

  isAtomic(): boolean {
    return this.parts.length < 2;
  }

  hasReferences(): boolean {
    return this.parts.some((part) => part.kind === 'reference');
  }

  /**
   * Substitute references with the current fragments of the value `lookup`
   * returns for their name. Unknown references are kept.
   *
   * @returns number of references substituted
   */
  replace(lookup: (name: string) => Value | undefined): number {
    if (!this.hasReferences()) {
      return 0;
    }

    let replaced = 0;
    this.parts = this.parts.flatMap((part) => {
      if (part.kind !== 'reference') {
        return [part];
      }
      const target = lookup(part.name);
      if (!target) {
        return [part];
      }
      replaced++;
      return target.fragments;
    });
    return replaced;
  }

  /**
   * Merge every run of adjacent literals into a single literal.
   */
  join(): void {
    const joined: Fragment[] = [];
    for (const part of this.parts) {
      const last = joined[joined.length - 1];
      if (part.kind === 'literal' && last?.kind === 'literal') {
        joined[joined.length - 1] = literal(last.text + part.text);
      } else {
        joined.push(part);
      }
    }
    this.parts = joined;
  }

  /**
   * Plain rendering: a lone literal is its text, a lone reference its name,
   * anything else the `"text" # name` concatenation form.
   */
  toString(): string {
    const [first] = this.parts;
    if (this.parts.length === 1 && first) {
      return first.kind === 'literal' ? first.text : first.name;
    }
    return this.concatenation();
  }

  /**
   * Source rendering: like {@link toString}, but a lone literal is delimited.
   */
  toBibtex(delimiter: ValueDelimiter = 'braces'): string {
    const [first] = this.parts;
    if (this.parts.length === 0) {
      return wrap('', delimiter);
    }
    if (this.parts.length === 1 && first?.kind === 'literal') {
      return wrap(first.text, delimiter);
    }
    return this.concatenation();
  }

  toJSON(): Fragment[] {
    return this.fragments;
  }

  private concatenation(): string {
    return this.parts
      .map((part) => (part.kind === 'literal' ? wrap(part.text, 'quotes') : part.name))
      .join(' # ');
  }
}
