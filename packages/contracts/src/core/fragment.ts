/**
 * A literal piece of text inside a value.
 */
export interface LiteralFragment {
  kind: 'literal';
  text: string;
}

/**
 * A reference to a string constant (macro) by name.
 * Resolution substitutes it with the constant's current value.
 */
export interface ReferenceFragment {
  kind: 'reference';
  name: string;
}

/**
 * One fragment of a value: either literal text or a macro reference.
 */
export type Fragment = LiteralFragment | ReferenceFragment;
