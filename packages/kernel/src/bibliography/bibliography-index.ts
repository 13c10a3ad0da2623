import type { Entry } from '../elements/entry.js';
import type { StringConstant } from '../elements/string-constant.js';
import type { ParseFailure } from '../elements/parse-failure.js';

/**
 * Mutable handle on a bibliography's derived indexes.
 *
 * The container passes it to element lifecycle hooks so each variant decides
 * how (or whether) it indexes itself, while the indexes stay owned by the
 * container.
 */
export interface BibliographyIndex {
  /** Handle of the owning bibliography in the bibliography registry */
  readonly bibliographyId: string;

  /** Index an entry under its normalized key. The last registration wins. */
  registerEntry(entry: Entry): void;

  /** Drop an entry from the key index if it is the one registered there. */
  unregisterEntry(entry: Entry): void;

  registerConstant(constant: StringConstant): void;

  unregisterConstant(constant: StringConstant): void;

  /** Append a fragment to the error list. */
  retainError(failure: ParseFailure): void;
}
