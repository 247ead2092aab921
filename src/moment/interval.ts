import { finest, type Grain } from './grain';
import { Moment } from './moment';

/**
 * Half-open span `[start, end)` tagged with its grain. Without an explicit
 * `end` the interval covers exactly one unit of `grain`.
 */
export class Interval {
  constructor(
    readonly start: Moment,
    readonly end: Moment | undefined,
    readonly grain: Grain,
  ) {}

  static startingAt(start: Moment, grain: Grain): Interval {
    return new Interval(start, undefined, grain);
  }

  static between(start: Moment, end: Moment, grain: Grain): Interval {
    return new Interval(start, end, grain);
  }

  endMoment(): Moment {
    return this.end ?? this.start.add(this.grain, 1);
  }

  contains(moment: Moment): boolean {
    return !moment.isBefore(this.start) && moment.isBefore(this.endMoment());
  }

  /**
   * Overlap of both spans at the finer grain, or undefined when they are
   * disjoint. A result exactly one grain long carries no explicit end.
   */
  intersect(other: Interval): Interval | undefined {
    const start = Moment.max(this.start, other.start);
    const end = Moment.min(this.endMoment(), other.endMoment());
    if (!start.isBefore(end)) return undefined;

    const grain = finest(this.grain, other.grain);
    return start.add(grain, 1).equals(end)
      ? Interval.startingAt(start, grain)
      : Interval.between(start, end, grain);
  }

  equals(other: Interval): boolean {
    return (
      this.grain === other.grain &&
      this.start.equals(other.start) &&
      this.endMoment().equals(other.endMoment())
    );
  }

  toString(): string {
    return this.end
      ? `[${this.start.toISOString()}, ${this.end.toISOString()}) ${this.grain}`
      : `[${this.start.toISOString()}] ${this.grain}`;
  }
}
