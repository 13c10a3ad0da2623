import type { EntryHash, Fragment, XmlNode } from '@bibkit/contracts';
import { BibElement } from './element.js';
import { Value } from './value.js';
import { missingFields } from './required-fields.js';
import type { BibliographyIndex } from '../bibliography/bibliography-index.js';
import type { StringConstant } from './string-constant.js';

/**
 * Normalize a citation key for indexing and lookup.
 */
export function normalizeKey(key: string): string {
  return key.trim();
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

function toValue(value: Value | string): Value {
  return typeof value === 'string' ? Value.literal(value) : value;
}

export interface EntryInit {
  type: string;
  key: string;
  fields?: Record<string, Value | string> | Map<string, Value | string>;
}

/**
 * A bibliographic record: `@article{key, title = {...}, ...}`.
 *
 * Field names and the entry type are case-insensitive and stored lower-cased.
 * Fields keep their insertion order.
 */
export class Entry extends BibElement {
  readonly kind = 'entry';

  private entryKey: string;
  private entryType: string;
  private readonly fieldMap = new Map<string, Value>();

  constructor(init: EntryInit) {
    super();
    this.entryKey = normalizeKey(init.key);
    this.entryType = normalizeName(init.type);

    const fields = init.fields ?? {};
    const pairs = fields instanceof Map ? Array.from(fields) : Object.entries(fields);
    for (const [name, value] of pairs) {
      this.set(name, value);
    }
  }

  get key(): string {
    return this.entryKey;
  }

  /**
   * Renaming an attached entry does not re-index it; lookups fall back to a
   * scan of the registered entries.
   */
  set key(key: string) {
    this.entryKey = normalizeKey(key);
  }

  get type(): string {
    return this.entryType;
  }

  set type(type: string) {
    this.entryType = normalizeName(type);
  }

  get fields(): ReadonlyMap<string, Value> {
    return this.fieldMap;
  }

  get(name: string): Value | undefined {
    return this.fieldMap.get(normalizeName(name));
  }

  has(name: string): boolean {
    return this.fieldMap.has(normalizeName(name));
  }

  set(name: string, value: Value | string): this {
    this.fieldMap.set(normalizeName(name), toValue(value));
    return this;
  }

  delete(name: string): boolean {
    return this.fieldMap.delete(normalizeName(name));
  }

  /**
   * True if the entry has a key and all fields its type requires.
   */
  isValid(): boolean {
    return this.entryKey !== '' && missingFields(this.entryType, (field) => this.has(field)).length === 0;
  }

  override onAttach(index: BibliographyIndex): this {
    super.onAttach(index);
    index.registerEntry(this);
    return this;
  }

  override onDetach(index: BibliographyIndex): this {
    index.unregisterEntry(this);
    return super.onDetach(index);
  }

  /**
   * Substitute constant references in every field.
   *
   * @returns number of references substituted
   */
  replace(constants: ReadonlyMap<string, StringConstant>): number {
    let replaced = 0;
    for (const value of this.fieldMap.values()) {
      replaced += value.replace((name) => constants.get(name)?.value);
    }
    return replaced;
  }

  join(): void {
    for (const value of this.fieldMap.values()) {
      value.join();
    }
  }

  toHash(): EntryHash {
    return {
      key: this.entryKey,
      type: this.entryType,
      ...Object.fromEntries(
        Array.from(this.fieldMap, ([name, value]): [string, string] => [name, value.toString()]),
      ),
    };
  }

  toXml(): XmlNode {
    return {
      tag: this.entryType,
      attributes: { key: this.entryKey },
      children: Array.from(this.fieldMap, ([name, value]) => ({
        tag: name,
        attributes: {},
        children: [value.toString()],
      })),
    };
  }

  toJSON(): Record<string, unknown> {
    return {
      kind: this.kind,
      key: this.entryKey,
      type: this.entryType,
      fields: Object.fromEntries(
        Array.from(this.fieldMap, ([name, value]): [string, Fragment[]] => [name, value.toJSON()]),
      ),
    };
  }

  toString(): string {
    const fields = Array.from(this.fieldMap, ([name, value]) => `,\n  ${name} = ${value.toBibtex('braces')}`);
    return `@${this.entryType}{${this.entryKey}${fields.join('')}\n}\n`;
  }
}
