import type { Element } from './types.js';
import type { StringConstant } from './string-constant.js';

/**
 * Elements whose values can have constant references substituted.
 */
export interface Resolvable {
  replace(constants: ReadonlyMap<string, StringConstant>): number;
}

/**
 * Elements whose values can be flattened into single literals.
 */
export interface Joinable {
  join(): void;
}

export function asResolvable(element: Element): (Element & Resolvable) | undefined {
  switch (element.kind) {
    case 'entry':
    case 'string':
    case 'preamble':
      return element;
    case 'comment':
    case 'meta-comment':
    case 'error':
      return undefined;
  }
}

export function asJoinable(element: Element): (Element & Joinable) | undefined {
  switch (element.kind) {
    case 'entry':
    case 'string':
    case 'preamble':
      return element;
    case 'comment':
    case 'meta-comment':
    case 'error':
      return undefined;
  }
}
