import { ELEMENT_KINDS, type ElementKind, type ParseOptions } from '@bibkit/contracts';
import { ConfigurationError } from '@bibkit/shared';

/**
 * Element kinds string resolution and joining visit unless told otherwise.
 */
export const DEFAULT_STRING_INCLUDE: readonly ElementKind[] = ['string', 'preamble', 'entry'];

/**
 * Parser defaults.
 */
export const DEFAULT_PARSE_OPTIONS: Required<ParseOptions> = {
  includeErrors: true,
  includeMetaContent: true,
  allowMissingKeys: false,
};

/**
 * Options of `replaceStrings` / `joinStrings`.
 */
export interface StringOptions {
  /** Element kinds to visit (default: string constants, preambles and entries) */
  include?: readonly ElementKind[];
}

/**
 * Resolve the include list, rejecting kinds that do not exist.
 */
export function resolveInclude(options: StringOptions = {}): readonly ElementKind[] {
  const include = options.include ?? DEFAULT_STRING_INCLUDE;
  const unknown = include.filter((kind) => !ELEMENT_KINDS.includes(kind));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown element kind(s): ${unknown.join(', ')}`, { unknown });
  }
  return include;
}

/**
 * Merge parse options over the defaults.
 */
export function resolveParseOptions(options: ParseOptions = {}): Required<ParseOptions> {
  return {
    includeErrors: options.includeErrors ?? DEFAULT_PARSE_OPTIONS.includeErrors,
    includeMetaContent: options.includeMetaContent ?? DEFAULT_PARSE_OPTIONS.includeMetaContent,
    allowMissingKeys: options.allowMissingKeys ?? DEFAULT_PARSE_OPTIONS.allowMissingKeys,
  };
}

/**
 * Copy only the parse options out of a wider options object.
 */
export function pickParseOptions(options: ParseOptions): ParseOptions {
  const picked: ParseOptions = {};
  if (options.includeErrors !== undefined) {
    picked.includeErrors = options.includeErrors;
  }
  if (options.includeMetaContent !== undefined) {
    picked.includeMetaContent = options.includeMetaContent;
  }
  if (options.allowMissingKeys !== undefined) {
    picked.allowMissingKeys = options.allowMissingKeys;
  }
  return picked;
}
