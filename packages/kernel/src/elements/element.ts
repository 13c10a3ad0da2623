import type { ElementKind } from '@bibkit/contracts';
import { structurallyEqual } from '@bibkit/shared';
import type { Bibliography } from '../bibliography/bibliography.js';
import type { BibliographyIndex } from '../bibliography/bibliography-index.js';
import { bibliographyRegistry } from '../registry/registry.js';
import type { Element } from './types.js';

/**
 * Base of every bibliography element.
 *
 * The association with a bibliography is a handle looked up in the
 * bibliography registry; elements never hold their container directly.
 * The variant set is sealed: `kind` identifies the variant exactly.
 */
export abstract class BibElement {
  abstract readonly kind: ElementKind;

  private bibliographyId: string | undefined;

  /**
   * The bibliography this element is attached to, if it is still alive.
   */
  get bibliography(): Bibliography | undefined {
    return this.bibliographyId === undefined
      ? undefined
      : bibliographyRegistry.get(this.bibliographyId);
  }

  /**
   * Handle of the owning bibliography, kept even if the owner was collected.
   */
  get ownerId(): string | undefined {
    return this.bibliographyId;
  }

  isAttached(): boolean {
    return this.bibliography !== undefined;
  }

  /**
   * Registration hook invoked by the container.
   *
   * Subclasses register themselves into the container's indexes through
   * `index` and return the element the container should store.
   */
  onAttach(index: BibliographyIndex): this {
    this.bibliographyId = index.bibliographyId;
    return this;
  }

  /**
   * Deregistration hook invoked by the container.
   */
  onDetach(_index: BibliographyIndex): this {
    this.bibliographyId = undefined;
    return this;
  }

  /**
   * Same variant carrying the same content.
   */
  equals(other: BibElement): boolean {
    return this.kind === other.kind && structurallyEqual(this.toJSON(), other.toJSON());
  }

  /**
   * Structural snapshot of the element's content.
   */
  abstract toJSON(): Record<string, unknown>;

  /**
   * BibTeX source rendering.
   */
  abstract toString(): string;
}

/**
 * Runtime check used to validate untyped input handed to a bibliography.
 */
export function isElement(value: unknown): value is Element {
  return value instanceof BibElement;
}
