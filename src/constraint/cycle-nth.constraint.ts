import type { Grain } from '../moment/grain';
import { Interval } from '../moment/interval';
import type { Moment } from '../moment/moment';
import type { TimeWindow } from '../moment/time-window';
import type { Constraint, Walker } from './constraint.types';
import { emptyWalker, walkerOf } from './walker';

/**
 * The grain unit `offset` steps away from the one holding the reference:
 * "today" is (day, 0), "next week" (week, 1), "last month" (month, -1).
 * Always counted from the reference, whatever the pivot; the pivot only picks
 * the side the unit lands on.
 */
export class CycleNth implements Constraint {
  constructor(
    readonly grain: Grain,
    readonly offset: number,
  ) {}

  toWalker(
    reference: Interval,
    window: TimeWindow,
    pivot: Moment = reference.start,
  ): Walker {
    const start = reference.start.startOf(this.grain).add(this.grain, this.offset);
    if (start.isBefore(window.min.start) || start.isAfter(window.max.start)) {
      return emptyWalker();
    }

    const target = Interval.startingAt(start, this.grain);
    return target.endMoment().isAfter(pivot)
      ? walkerOf([target], [])
      : walkerOf([], [target]);
  }
}
