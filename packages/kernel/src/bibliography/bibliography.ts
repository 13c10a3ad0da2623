import { readFileSync, writeFileSync } from 'fs';
import type { BibliographyParser, ElementKind, EntryHash, ParseOptions } from '@bibkit/contracts';
import {
  BibkitError,
  ElementOwnershipError,
  ElementTypeError,
  createLogger,
  generateBibliographyId,
  type IdGenerator,
  type Logger,
} from '@bibkit/shared';
import type { BibliographyIndex } from './bibliography-index.js';
import { isElement } from '../elements/element.js';
import { normalizeKey, type Entry } from '../elements/entry.js';
import type { StringConstant } from '../elements/string-constant.js';
import type { Preamble } from '../elements/preamble.js';
import type { Comment } from '../elements/comment.js';
import type { MetaComment } from '../elements/meta-comment.js';
import type { ParseFailure } from '../elements/parse-failure.js';
import type { Element, ElementOfKind } from '../elements/types.js';
import { findByType as filterByType } from '../filter/type-filter.js';
import {
  joinStrings as joinValues,
  replaceStrings as resolveReferences,
  type ResolutionSummary,
} from '../resolver/string-resolver.js';
import { renderText } from '../export/text-exporter.js';
import { renderHash, renderJson, renderYaml } from '../export/hash-exporter.js';
import { renderXml } from '../export/xml-exporter.js';
import { pickParseOptions, resolveInclude, type StringOptions } from '../config/options.js';
import { bibliographyRegistry } from '../registry/registry.js';

export interface BibliographyOptions {
  /** Logger for container events (default: console logger at info level) */
  logger?: Logger;
  /** ID generator for the bibliography handle, for deterministic tests */
  idGenerator?: IdGenerator;
  /** File the bibliography belongs to, used by `save()` */
  path?: string;
}

export interface OpenOptions extends ParseOptions {
  /** Parser collaborator turning the file content into a bibliography */
  parser: BibliographyParser<Bibliography>;
  logger?: Logger;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.iterator in value;
}

/**
 * An ordered collection of bibliography elements, typically one `.bib` file.
 *
 * Elements are kept in insertion order, which string resolution and the
 * text rendering depend on. Entries and string constants are additionally
 * indexed by key and name; the elements maintain those indexes themselves
 * through their attach/detach hooks.
 *
 * @example
 * ```typescript
 * const bibliography = new Bibliography([
 *   new StringConstant('pub', 'ACM'),
 *   new Entry({ type: 'book', key: 'k', fields: { publisher: Value.from([reference('pub')]) } }),
 * ]);
 * bibliography.replaceStrings();
 * bibliography.get('k')?.get('publisher')?.toString(); // 'ACM'
 * ```
 */
export class Bibliography implements Iterable<Element> {
  readonly id: string;
  path: string | undefined;

  private readonly data: Element[] = [];
  private readonly entryIndex = new Map<string, Entry>();
  private readonly constantIndex = new Map<string, StringConstant>();
  private readonly failures: ParseFailure[] = [];
  private readonly logger: Logger;
  private readonly index: BibliographyIndex;

  /**
   * Read the file at `path` and hand its content to `options.parser`.
   *
   * File system errors propagate unchanged. Problems inside the file do not
   * throw; they end up in the returned bibliography's `errors`.
   */
  static open(path: string, options: OpenOptions): Bibliography {
    const logger = options.logger ?? createLogger();
    logger.debug('Opening file', { path });

    const content = readFileSync(path, 'utf-8');
    const bibliography = options.parser.parse(content, pickParseOptions(options));
    bibliography.path = path;

    logger.debug('Parsed file', {
      path,
      elements: bibliography.length,
      errors: bibliography.errors.length,
    });
    return bibliography;
  }

  constructor(data: Element | Iterable<Element> = [], options: BibliographyOptions = {}) {
    this.id = generateBibliographyId(options.idGenerator);
    this.path = options.path;
    this.logger = options.logger ?? createLogger();
    this.index = this.createIndex();

    bibliographyRegistry.register(this.id, this);
    this.add(data);
  }

  /**
   * Add an element or every element of an iterable, in order.
   * Nothing is added unless every item is an element that can be attached.
   */
  add(data: Element | Iterable<Element>): this {
    for (const element of this.collect(data)) {
      this.attach(element);
    }
    return this;
  }

  /**
   * Add a single element. The element's attach hook decides what is stored.
   */
  append(element: Element): this {
    if (!isElement(element)) {
      throw new ElementTypeError('A bibliography can contain only elements', element);
    }
    this.attach(this.checkOwnership(element));
    return this;
  }

  /**
   * Remove `element`, or else the first element structurally equal to it.
   *
   * @returns the removed element, or undefined if nothing matched
   */
  delete(element: Element): Element | undefined {
    if (!isElement(element)) {
      throw new ElementTypeError('Only elements can be deleted from a bibliography', element);
    }

    let position = this.data.indexOf(element);
    if (position < 0) {
      position = this.data.findIndex((candidate) => candidate.equals(element));
    }
    const removed = this.data[position];
    if (!removed) {
      return undefined;
    }

    this.data.splice(position, 1);
    // an instance added more than once stays attached until its last copy goes
    if (!this.data.includes(removed)) {
      removed.onDetach(this.index);
    }
    this.logger.debug('Deleted element', { bibliography: this.id, kind: removed.kind });
    return removed;
  }

  /**
   * Detach and remove every element. Retained errors stay until the
   * bibliography itself is replaced.
   *
   * @returns the removed elements
   */
  deleteAll(): Element[] {
    const removed = this.data.splice(0);
    for (const element of removed) {
      element.onDetach(this.index);
    }
    this.entryIndex.clear();
    this.constantIndex.clear();
    return removed;
  }

  get preambles(): Preamble[] {
    return this.findByType('preamble');
  }

  get comments(): Comment[] {
    return this.findByType('comment');
  }

  /**
   * Text found outside of any object.
   */
  get metaComments(): MetaComment[] {
    return this.findByType('meta-comment');
  }

  /**
   * Fragments that could not be parsed, in the order they were added.
   * The list only grows: deleting a fragment does not remove it from here.
   */
  get errors(): readonly ParseFailure[] {
    return this.failures;
  }

  hasErrors(): boolean {
    return this.failures.length > 0;
  }

  /**
   * True if there are no errors and every indexed entry is valid.
   * Other element kinds do not take part.
   */
  isValid(): boolean {
    if (this.hasErrors()) {
      return false;
    }
    for (const entry of this.entryIndex.values()) {
      if (!entry.isValid()) return false;
    }
    return true;
  }

  /**
   * Replace constant references with the constants' values, in place.
   *
   * Elements are visited once, in order, so a constant only sees the
   * resolved value of constants defined before it.
   */
  replaceStrings(options: StringOptions = {}): ResolutionSummary {
    const summary = resolveReferences(this.findByType(resolveInclude(options)), this.constantIndex);
    this.logger.debug('Replaced strings', { bibliography: this.id, ...summary });
    return summary;
  }

  /**
   * Merge adjacent literals. Meant to follow `replaceStrings`; references
   * that were not replaced stay as they are.
   *
   * @returns number of elements joined
   */
  joinStrings(options: StringOptions = {}): number {
    return joinValues(this.findByType(resolveInclude(options)));
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  get length(): number {
    return this.data.length;
  }

  [Symbol.iterator](): Iterator<Element> {
    return this.data[Symbol.iterator]();
  }

  /**
   * The live element sequence. Changes made to it bypass the indexes.
   */
  toArray(): Element[] {
    return this.data;
  }

  /**
   * Entry by citation key.
   */
  get(key: string): Entry | undefined {
    const normalized = normalizeKey(key);
    return this.entryIndex.get(normalized) ?? this.findEntry(normalized);
  }

  get entries(): ReadonlyMap<string, Entry> {
    return this.entryIndex;
  }

  get constants(): ReadonlyMap<string, StringConstant> {
    return this.constantIndex;
  }

  /**
   * BibTeX source of all elements.
   */
  toString(): string {
    return renderText(this.data);
  }

  /**
   * One hash per indexed entry. Only entries are exported.
   */
  toHash(): EntryHash[] {
    return renderHash(this.entryIndex.values());
  }

  toJson(space?: number): string {
    return renderJson(this.toHash(), space);
  }

  toYaml(): string {
    return renderYaml(this.toHash());
  }

  /**
   * XML document with a `<bibliography>` root. Only entries are exported.
   */
  toXml(): string {
    return renderXml(this.entryIndex.values());
  }

  /**
   * Write the BibTeX source to `path`.
   */
  save(): void {
    if (this.path === undefined) {
      throw new BibkitError('Bibliography has no path to save to', 'PATH_NOT_SET', {
        bibliography: this.id,
      });
    }
    this.saveTo(this.path);
  }

  saveTo(path: string): void {
    writeFileSync(path, this.toString(), 'utf-8');
    this.logger.debug('Saved bibliography', { bibliography: this.id, path });
  }

  private findByType<K extends ElementKind>(kinds: K | readonly K[]): ElementOfKind<K>[] {
    return filterByType(this.data, kinds);
  }

  /**
   * Scan the registered entries by their current key.
   */
  private findEntry(key: string): Entry | undefined {
    for (const entry of this.entryIndex.values()) {
      if (entry.key === key) return entry;
    }
    return undefined;
  }

  private collect(data: unknown): Element[] {
    if (isElement(data)) {
      return [this.checkOwnership(data)];
    }
    if (!isIterable(data)) {
      throw new ElementTypeError('Bibliography.add expects an element or an iterable of elements', data);
    }

    const elements: Element[] = [];
    for (const item of data) {
      if (!isElement(item)) {
        throw new ElementTypeError('A bibliography can contain only elements', item);
      }
      elements.push(this.checkOwnership(item));
    }
    return elements;
  }

  private checkOwnership<T extends Element>(element: T): T {
    const owner = element.ownerId;
    if (owner !== undefined && owner !== this.id && bibliographyRegistry.has(owner)) {
      throw new ElementOwnershipError(owner, { kind: element.kind });
    }
    return element;
  }

  private attach(element: Element): void {
    this.data.push(element.onAttach(this.index));
  }

  /**
   * Last element of `kind` in the sequence matching `predicate`.
   */
  private findLast<K extends ElementKind>(
    kind: K,
    predicate: (element: ElementOfKind<K>) => boolean,
  ): ElementOfKind<K> | undefined {
    const candidates = this.findByType(kind);
    for (let i = candidates.length - 1; i >= 0; i--) {
      const candidate = candidates[i];
      if (candidate && predicate(candidate)) return candidate;
    }
    return undefined;
  }

  private createIndex(): BibliographyIndex {
    return {
      bibliographyId: this.id,

      registerEntry: (entry) => {
        this.entryIndex.set(entry.key, entry);
      },

      unregisterEntry: (entry) => {
        const key = Array.from(this.entryIndex).find(([, registered]) => registered === entry)?.[0];
        if (key === undefined) return;

        // replaced in place so the key keeps its registration position
        const shadowed = this.findLast('entry', (candidate) => candidate.key === key);
        if (shadowed) {
          this.entryIndex.set(key, shadowed);
        } else {
          this.entryIndex.delete(key);
        }
      },

      registerConstant: (constant) => {
        this.constantIndex.set(constant.name, constant);
      },

      unregisterConstant: (constant) => {
        if (this.constantIndex.get(constant.name) !== constant) return;

        const shadowed = this.findLast('string', (candidate) => candidate.name === constant.name);
        if (shadowed) {
          this.constantIndex.set(constant.name, shadowed);
        } else {
          this.constantIndex.delete(constant.name);
        }
      },

      retainError: (failure) => {
        this.failures.push(failure);
      },

    };
  }
}
