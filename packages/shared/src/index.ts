/**
 * @bibkit/shared
 *
 * Shared utilities for bibkit.
 *
 * @packageDocumentation
 */

export { createLogger, type Logger, type LogLevel, type LoggerOptions, type LogSink } from './logging/logger.js';
export {
  BibkitError,
  ElementTypeError,
  ElementOwnershipError,
  ConfigurationError,
  BibtexSyntaxError,
} from './errors/errors.js';
export { generateBibliographyId, defaultIdGenerator, type IdGenerator } from './utils/ids.js';
export { canonicalStringify, structurallyEqual } from './canonical/canonical-json.js';
