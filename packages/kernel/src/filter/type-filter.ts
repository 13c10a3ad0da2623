import type { ElementKind } from '@bibkit/contracts';
import type { Element, ElementOfKind } from '../elements/types.js';

/**
 * Every element whose variant is exactly one of `kinds`, in original order.
 */
export function findByType<K extends ElementKind>(
  elements: readonly Element[],
  kinds: K | readonly K[],
): ElementOfKind<K>[] {
  const wanted = new Set<ElementKind>(typeof kinds === 'string' ? [kinds] : kinds);
  return elements.filter((element): element is ElementOfKind<K> => wanted.has(element.kind));
}
