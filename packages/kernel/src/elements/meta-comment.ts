import { BibElement } from './element.js';

/**
 * Free text found between objects, kept verbatim for round trips.
 */
export class MetaComment extends BibElement {
  readonly kind = 'meta-comment';

  text: string;

  constructor(text = '') {
    super();
    this.text = text;
  }

  toJSON(): Record<string, unknown> {
    return { kind: this.kind, text: this.text };
  }

  toString(): string {
    return this.text;
  }
}
