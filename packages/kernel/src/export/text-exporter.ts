import type { Element } from '../elements/types.js';

/**
 * Concatenate the source rendering of every element, in order.
 */
export function renderText(elements: Iterable<Element>): string {
  let text = '';
  for (const element of elements) {
    text += element.toString();
  }
  return text;
}
