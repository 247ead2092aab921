import type { Walker } from '../constraint/constraint.types';
import { next } from '../constraint/walker';
import type { Interval } from '../moment/interval';

/**
 * Picks the interval a datetime resolves to. Pulls `forward` at most twice
 * and `backward` at most once.
 *
 * When `notImmediate` is set, a first forward candidate overlapping the
 * reference is dropped for the next one. The backward side is only read when
 * the forward side yields nothing.
 */
export function selectCandidate(
  walker: Walker,
  reference: Interval,
  notImmediate: boolean,
): Interval | undefined {
  const head = next(walker.forward);
  const forward =
    head && notImmediate && head.intersect(reference)
      ? next(walker.forward)
      : head;
  return forward ?? next(walker.backward);
}
