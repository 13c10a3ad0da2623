import type { EntryHash } from '@bibkit/contracts';
import { stringify } from 'yaml';
import type { Entry } from '../elements/entry.js';

/**
 * One hash per entry, in the order given. Other element kinds have no hash
 * rendering and never reach this function.
 */
export function renderHash(entries: Iterable<Entry>): EntryHash[] {
  return Array.from(entries, (entry) => entry.toHash());
}

export function renderJson(hash: readonly EntryHash[], space?: number): string {
  return JSON.stringify(hash, null, space);
}

export function renderYaml(hash: readonly EntryHash[]): string {
  return stringify(hash);
}
