import { finest, type Grain } from '../moment/grain';
import type { Moment } from '../moment/moment';
import { Interval } from '../moment/interval';
import type { TimeWindow } from '../moment/time-window';
import type { Constraint, Walker } from './constraint.types';
import { iterate, walkerOf } from './walker';

/**
 * "from Monday to Wednesday": each `from` candidate joined to the first `to`
 * candidate starting at or after it. A span sits on the side of the walker
 * its `from` candidate came from.
 */
export class Span implements Constraint {
  readonly grain: Grain;

  constructor(
    private readonly from: Constraint,
    private readonly to: Constraint,
    private readonly inclusive: boolean,
  ) {
    this.grain = finest(from.grain, to.grain);
  }

  toWalker(
    reference: Interval,
    window: TimeWindow,
    pivot: Moment = reference.start,
  ): Walker {
    const starts = this.from.toWalker(reference, window, pivot);
    return walkerOf(
      this.join(starts.forward, reference, window),
      this.join(starts.backward, reference, window),
    );
  }

  private *join(
    starts: Iterator<Interval>,
    reference: Interval,
    window: TimeWindow,
  ): Generator<Interval> {
    for (const start of iterate(starts)) {
      const ends = this.to.toWalker(reference, window, start.start);
      for (const end of iterate(ends.forward)) {
        if (end.start.isBefore(start.start)) continue;
        const until = this.inclusive ? end.endMoment() : end.start;
        if (!until.isAfter(start.start)) continue;
        yield Interval.between(start.start, until, finest(start.grain, end.grain));
        break;
      }
    }
  }
}
