import type { Logger } from '@bibkit/shared';

/**
 * Configuration of the BibTeX parser
 */
export interface BibtexParserConfig {
  /**
   * Logger for skipped fragments (warn) and parse summaries (debug).
   * The bibliographies the parser builds log through it as well.
   */
  logger?: Logger;
}

/**
 * Object types with their own grammar. Every other `@type` is an entry.
 */
export const SPECIAL_OBJECTS = ['comment', 'preamble', 'string'] as const;

export type SpecialObject = (typeof SPECIAL_OBJECTS)[number];
