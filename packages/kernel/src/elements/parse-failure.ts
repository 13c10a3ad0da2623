import { BibElement } from './element.js';
import type { BibliographyIndex } from '../bibliography/bibliography-index.js';

/**
 * A source fragment the parser could not read.
 *
 * It stays in the element sequence so the text survives a round trip.
 * Attaching it records it in the bibliography's error list, which keeps it
 * even after the element is deleted. It is never parsed again.
 */
export class ParseFailure extends BibElement {
  readonly kind = 'error';

  readonly content: string;
  readonly reason: string;
  /** Offset of the fragment in the parsed source text */
  readonly offset: number;

  constructor(content: string, reason: string, offset = 0) {
    super();
    this.content = content;
    this.reason = reason;
    this.offset = offset;
  }

  override onAttach(index: BibliographyIndex): this {
    super.onAttach(index);
    index.retainError(this);
    return this;
  }

  toJSON(): Record<string, unknown> {
    return { kind: this.kind, content: this.content, reason: this.reason, offset: this.offset };
  }

  toString(): string {
    return this.content;
  }
}
