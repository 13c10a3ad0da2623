import { BibElement } from './element.js';
import { Value } from './value.js';
import type { StringConstant } from './string-constant.js';

/**
 * Fore-matter passed through to the typesetter: `@preamble{ "..." }`.
 */
export class Preamble extends BibElement {
  readonly kind = 'preamble';

  value: Value;

  constructor(value: Value | string = '') {
    super();
    this.value = typeof value === 'string' ? Value.literal(value) : value;
  }

  replace(constants: ReadonlyMap<string, StringConstant>): number {
    return this.value.replace((name) => constants.get(name)?.value);
  }

  join(): void {
    this.value.join();
  }

  toJSON(): Record<string, unknown> {
    return { kind: this.kind, value: this.value.toJSON() };
  }

  toString(): string {
    return `@preamble{ ${this.value.toBibtex('quotes')} }\n`;
  }
}
