import { finest, isFiner, type Grain } from '../moment/grain';
import type { Interval } from '../moment/interval';
import { Moment } from '../moment/moment';
import type { TimeWindow } from '../moment/time-window';
import type { Constraint, Walker } from './constraint.types';
import { iterate, next, prepend, walkerOf } from './walker';

/**
 * Intervals satisfying both constraints ("Monday in March", "tomorrow at
 * 5pm"). The coarser constraint drives the walk; the finer one is searched
 * inside each of its candidates.
 */
export class Intersection implements Constraint {
  readonly grain: Grain;
  private readonly outer: Constraint;
  private readonly inner: Constraint;

  constructor(a: Constraint, b: Constraint) {
    const swap = isFiner(a.grain, b.grain);
    this.outer = swap ? b : a;
    this.inner = swap ? a : b;
    this.grain = finest(a.grain, b.grain);
  }

  toWalker(
    reference: Interval,
    window: TimeWindow,
    pivot: Moment = reference.start,
  ): Walker {
    return walkerOf(
      this.forward(reference, window, pivot),
      this.backward(reference, window, pivot),
    );
  }

  private *forward(
    reference: Interval,
    window: TimeWindow,
    pivot: Moment,
  ): Generator<Interval> {
    const outers = this.outer.toWalker(reference, window, pivot);
    for (const outer of iterate(outers.forward)) {
      const from = Moment.max(outer.start, pivot);
      const inners = this.inner.toWalker(reference, window, from);
      for (const candidate of iterate(inners.forward)) {
        if (!candidate.start.isBefore(outer.endMoment())) break;
        const hit = candidate.intersect(outer);
        if (hit) yield hit;
      }
    }
  }

  private *backward(
    reference: Interval,
    window: TimeWindow,
    pivot: Moment,
  ): Generator<Interval> {
    const outers = this.outer.toWalker(reference, window, pivot);
    // The outer candidate straddling the pivot still holds past inner candidates.
    const current = next(outers.forward);
    const sequence =
      current && current.start.isBefore(pivot)
        ? prepend(current, outers.backward)
        : iterate(outers.backward);

    for (const outer of sequence) {
      const until = Moment.min(outer.endMoment(), pivot);
      const inners = this.inner.toWalker(reference, window, until);
      for (const candidate of iterate(inners.backward)) {
        if (!candidate.endMoment().isAfter(outer.start)) break;
        const hit = candidate.intersect(outer);
        if (hit) yield hit;
      }
    }
  }
}
