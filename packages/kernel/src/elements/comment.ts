import { BibElement } from './element.js';

/**
 * An explicit `@comment{...}` object.
 */
export class Comment extends BibElement {
  readonly kind = 'comment';

  text: string;

  constructor(text = '') {
    super();
    this.text = text;
  }

  toJSON(): Record<string, unknown> {
    return { kind: this.kind, text: this.text };
  }

  toString(): string {
    return `@comment{ ${this.text} }\n`;
  }
}
