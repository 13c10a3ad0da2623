import { BibElement } from './element.js';
import { Value } from './value.js';
import type { BibliographyIndex } from '../bibliography/bibliography-index.js';

/**
 * A string constant (macro): `@string{ acm = "ACM Press" }`.
 */
export class StringConstant extends BibElement {
  readonly kind = 'string';

  readonly name: string;
  value: Value;

  constructor(name: string, value: Value | string) {
    super();
    this.name = name.trim();
    this.value = typeof value === 'string' ? Value.literal(value) : value;
  }

  override onAttach(index: BibliographyIndex): this {
    super.onAttach(index);
    index.registerConstant(this);
    return this;
  }

  override onDetach(index: BibliographyIndex): this {
    index.unregisterConstant(this);
    return super.onDetach(index);
  }

  replace(constants: ReadonlyMap<string, StringConstant>): number {
    return this.value.replace((name) => constants.get(name)?.value);
  }

  join(): void {
    this.value.join();
  }

  toJSON(): Record<string, unknown> {
    return { kind: this.kind, name: this.name, value: this.value.toJSON() };
  }

  toString(): string {
    return `@string{ ${this.name} = ${this.value.toBibtex('quotes')} }\n`;
  }
}
