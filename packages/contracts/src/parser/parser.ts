/**
 * Options understood by bibliography parsers.
 */
export interface ParseOptions {
  /**
   * Retain unparsable fragments as error elements (default: true).
   * When false they are dropped after being logged.
   */
  includeErrors?: boolean;

  /**
   * Retain text outside of any object as meta comments (default: true)
   */
  includeMetaContent?: boolean;

  /**
   * Accept entries without a citation key (default: false)
   */
  allowMissingKeys?: boolean;
}

/**
 * The parser collaborator.
 *
 * Implementations turn source text into a bibliography. The only contract is
 * that the returned container was populated through its own `add`/`append`,
 * so any parser honoring that is interchangeable.
 *
 * @example
 * ```typescript
 * const parser: BibliographyParser<Bibliography> = {
 *   parse(text) {
 *     return new Bibliography(myTokenizer(text));
 *   },
 * };
 * ```
 */
export interface BibliographyParser<T> {
  parse(text: string, options?: ParseOptions): T;
}
