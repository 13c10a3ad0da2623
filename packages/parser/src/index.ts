/**
 * @bibkit/parser
 *
 * Tolerant BibTeX parser. Plugs into `Bibliography.open` as its parser.
 *
 * @packageDocumentation
 */

export { createBibtexParser, bibtexParser } from './parser.js';

// Element-level parsing (for direct use)
export { parseBibtex } from './parse-bibtex.js';

export type { BibtexParserConfig, SpecialObject } from './types.js';
export { SPECIAL_OBJECTS } from './types.js';
