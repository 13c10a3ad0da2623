import type { Entry } from './entry.js';
import type { StringConstant } from './string-constant.js';
import type { Preamble } from './preamble.js';
import type { Comment } from './comment.js';
import type { MetaComment } from './meta-comment.js';
import type { ParseFailure } from './parse-failure.js';

/**
 * The sealed set of document nodes a bibliography holds.
 */
export type Element = Entry | StringConstant | Preamble | Comment | MetaComment | ParseFailure;

/**
 * The element variant(s) carrying the given kind.
 */
export type ElementOfKind<K extends Element['kind']> = Extract<Element, { kind: K }>;
