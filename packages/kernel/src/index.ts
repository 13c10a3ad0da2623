/**
 * @bibkit/kernel
 *
 * Bibliography container, element model, string resolution and exporters.
 *
 * Parsing lives in @bibkit/parser; anything implementing
 * `BibliographyParser` can feed `Bibliography.open`.
 *
 * @packageDocumentation
 */

export {
  Bibliography,
  type BibliographyOptions,
  type OpenOptions,
} from './bibliography/bibliography.js';
export type { BibliographyIndex } from './bibliography/bibliography-index.js';

export * from './elements/index.js';

export { HandleRegistry, bibliographyRegistry } from './registry/registry.js';
export { findByType } from './filter/type-filter.js';
export { replaceStrings, joinStrings, type ResolutionSummary } from './resolver/string-resolver.js';

export {
  DEFAULT_STRING_INCLUDE,
  DEFAULT_PARSE_OPTIONS,
  resolveInclude,
  resolveParseOptions,
  pickParseOptions,
  type StringOptions,
} from './config/options.js';

// Exporters
export { renderText } from './export/text-exporter.js';
export { renderHash, renderJson, renderYaml } from './export/hash-exporter.js';
export { renderXml, XML_DECLARATION, XML_ROOT } from './export/xml-exporter.js';
