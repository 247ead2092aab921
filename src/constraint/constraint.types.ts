import type { Grain } from '../moment/grain';
import type { Interval } from '../moment/interval';
import type { Moment } from '../moment/moment';
import type { TimeWindow } from '../moment/time-window';

/**
 * Candidate intervals around a pivot, produced lazily.
 *
 * `forward` yields candidates ending after the pivot, ascending.
 * `backward` yields candidates ending at or before it, descending.
 * Neither is restartable; each pull may do calendar work.
 */
export interface Walker {
  readonly forward: Iterator<Interval>;
  readonly backward: Iterator<Interval>;
}

/**
 * A temporal expression not yet anchored to a reference.
 *
 * `reference` is the request's "now" that relative parts ("tomorrow", "last
 * week") count from. `pivot` splits the walker's two sides and defaults to
 * `reference.start`; composite constraints move it while the reference stays.
 */
export interface Constraint {
  readonly grain: Grain;
  toWalker(reference: Interval, window: TimeWindow, pivot?: Moment): Walker;
}
