import type { BibliographyParser } from '@bibkit/contracts';
import { createLogger } from '@bibkit/shared';
import { Bibliography } from '@bibkit/kernel';
import { parseBibtex } from './parse-bibtex.js';
import type { BibtexParserConfig } from './types.js';

/**
 * BibTeX parser factory.
 *
 * The returned parser builds each bibliography through its constructor, so
 * every element goes through `add` and its attach hook.
 *
 * @example
 * ```typescript
 * const parser = createBibtexParser({ logger: createLogger({ level: 'debug' }) });
 * const bibliography = Bibliography.open('refs.bib', { parser });
 * ```
 */
export function createBibtexParser(config: BibtexParserConfig = {}): BibliographyParser<Bibliography> {
  const logger = config.logger ?? createLogger();

  return {
    parse(text, options) {
      return new Bibliography(parseBibtex(text, options, logger), { logger });
    },
  };
}

/**
 * Parser with the default configuration
 */
export const bibtexParser = createBibtexParser();
