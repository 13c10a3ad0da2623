import type { Element } from '../elements/types.js';
import type { StringConstant } from '../elements/string-constant.js';
import { asJoinable, asResolvable } from '../elements/capabilities.js';

/**
 * Outcome of a resolution pass.
 */
export interface ResolutionSummary {
  /** Elements that took part in the pass */
  visited: number;
  /** References substituted across all of them */
  replaced: number;
}

/**
 * Substitute constant references, element by element, in the given order.
 *
 * Each reference takes the constant's value as it is at that point of the
 * pass: a constant defined earlier has already been resolved, one defined
 * later has not. There is exactly one pass.
 */
export function replaceStrings(
  elements: readonly Element[],
  constants: ReadonlyMap<string, StringConstant>,
): ResolutionSummary {
  const summary: ResolutionSummary = { visited: 0, replaced: 0 };
  for (const element of elements) {
    const resolvable = asResolvable(element);
    if (!resolvable) continue;

    summary.visited++;
    summary.replaced += resolvable.replace(constants);
  }
  return summary;
}

/**
 * Flatten adjacent literals of every joinable element.
 *
 * @returns number of elements joined
 */
export function joinStrings(elements: readonly Element[]): number {
  let joined = 0;
  for (const element of elements) {
    const joinable = asJoinable(element);
    if (!joinable) continue;

    joinable.join();
    joined++;
  }
  return joined;
}
