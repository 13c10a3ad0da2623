/**
 * Discriminant of the sealed element variant set.
 *
 * - `entry`: bibliographic record (`@article{...}`)
 * - `string`: string constant / macro (`@string{...}`)
 * - `preamble`: fore-matter (`@preamble{...}`)
 * - `comment`: explicit comment (`@comment{...}`)
 * - `meta-comment`: free text outside of any object
 * - `error`: a fragment the parser could not make sense of
 */
export type ElementKind = 'entry' | 'string' | 'preamble' | 'comment' | 'meta-comment' | 'error';

export const ELEMENT_KINDS: readonly ElementKind[] = [
  'entry',
  'string',
  'preamble',
  'comment',
  'meta-comment',
  'error',
] as const;
