import { Grain } from '../moment/grain';
import type { Interval } from '../moment/interval';
import type { Moment } from '../moment/moment';
import type { TimeWindow } from '../moment/time-window';
import { InvalidConstraintError } from '../common/errors';
import type { Constraint, Walker } from './constraint.types';
import { ascending, descending, filter, walkerOf } from './walker';

/**
 * Grain-aligned units whose start satisfies a predicate. The unit containing
 * the pivot opens the forward side.
 */
export abstract class AlignedConstraint implements Constraint {
  constructor(readonly grain: Grain) {}

  protected abstract matches(start: Moment): boolean;

  toWalker(
    reference: Interval,
    window: TimeWindow,
    pivot: Moment = reference.start,
  ): Walker {
    const anchor = pivot.startOf(this.grain);
    const accept = (candidate: Interval) => this.matches(candidate.start);
    return walkerOf(
      filter(ascending(anchor, this.grain, window), accept),
      filter(descending(anchor.add(this.grain, -1), this.grain, window), accept),
    );
  }
}

function checkRange(name: string, value: number, min: number, max: number) {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidConstraintError(
      `${name} must be an integer in [${min}, ${max}], got ${value}`,
      { [name]: value },
    );
  }
}

/** Every unit of a grain: "a day", "each week". */
export class Cycle extends AlignedConstraint {
  protected matches(): boolean {
    return true;
  }
}

export class Year extends AlignedConstraint {
  constructor(readonly year: number) {
    super(Grain.YEAR);
    checkRange('year', year, 1, 9999);
  }

  protected matches(start: Moment): boolean {
    return start.year === this.year;
  }
}

/** Month of the year, 1 = January. */
export class Month extends AlignedConstraint {
  constructor(readonly month: number) {
    super(Grain.MONTH);
    checkRange('month', month, 1, 12);
  }

  protected matches(start: Moment): boolean {
    return start.month === this.month;
  }
}

export class DayOfMonth extends AlignedConstraint {
  constructor(readonly day: number) {
    super(Grain.DAY);
    checkRange('dayOfMonth', day, 1, 31);
  }

  protected matches(start: Moment): boolean {
    return start.dayOfMonth === this.day;
  }
}

/** ISO weekday, 1 = Monday … 7 = Sunday. */
export class DayOfWeek extends AlignedConstraint {
  constructor(readonly weekday: number) {
    super(Grain.DAY);
    checkRange('dayOfWeek', weekday, 1, 7);
  }

  protected matches(start: Moment): boolean {
    return start.isoWeekday === this.weekday;
  }
}

/** Hour of the day on a 24-hour clock. */
export class Hour extends AlignedConstraint {
  constructor(readonly hour: number) {
    super(Grain.HOUR);
    checkRange('hour', hour, 0, 23);
  }

  protected matches(start: Moment): boolean {
    return start.hour === this.hour;
  }
}

export class Minute extends AlignedConstraint {
  constructor(readonly minute: number) {
    super(Grain.MINUTE);
    checkRange('minute', minute, 0, 59);
  }

  protected matches(start: Moment): boolean {
    return start.minute === this.minute;
  }
}
