export { BibElement, isElement } from './element.js';
export { Value, literal, reference, type ValuePart, type ValueDelimiter } from './value.js';
export { Entry, normalizeKey, type EntryInit } from './entry.js';
export { StringConstant } from './string-constant.js';
export { Preamble } from './preamble.js';
export { Comment } from './comment.js';
export { MetaComment } from './meta-comment.js';
export { ParseFailure } from './parse-failure.js';
export { REQUIRED_FIELDS, missingFields } from './required-fields.js';
export { asResolvable, asJoinable, type Resolvable, type Joinable } from './capabilities.js';
export type { Element, ElementOfKind } from './types.js';
