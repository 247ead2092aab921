import { InvalidConstraintError } from '../common/errors';
import { Grain } from '../moment/grain';
import { Interval } from '../moment/interval';
import { Moment } from '../moment/moment';
import { DEFAULT_WINDOW, secondAt } from '../moment/time-window';
import {
  Cycle,
  DayOfMonth,
  DayOfWeek,
  Hour,
  Minute,
  Month,
  Year,
} from './calendar.constraints';
import type { Constraint } from './constraint.types';
import { next } from './walker';

const DAY = 86_400;
const HOUR = 3600;

function starts(iterator: Iterator<Interval>, count: number): number[] {
  const seen: number[] = [];
  for (let i = 0; i < count; i++) {
    const candidate = next(iterator);
    if (!candidate) break;
    seen.push(candidate.start.epochSeconds);
  }
  return seen;
}

function walk(constraint: Constraint, referenceSecs: number) {
  return constraint.toWalker(secondAt(referenceSecs), DEFAULT_WINDOW);
}

describe('calendar constraints', () => {
  it('walks Mondays forward from a Thursday', () => {
    const walker = walk(new DayOfWeek(1), 0);
    expect(starts(walker.forward, 2)).toEqual([4 * DAY, 11 * DAY]);
  });

  it('stops the backward side at the window minimum', () => {
    const walker = walk(new DayOfWeek(1), 0);
    expect(next(walker.backward)).toBeUndefined();
  });

  it('opens the forward side with the unit holding the reference', () => {
    const thursday = next(walk(new DayOfWeek(4), 12 * HOUR).forward);
    expect(thursday?.start.epochSeconds).toBe(0);
    expect(thursday?.grain).toBe(Grain.DAY);
  });

  it('walks backward in decreasing order', () => {
    // 1970-01-21 is a Wednesday
    const walker = walk(new DayOfWeek(1), 20 * DAY);
    expect(starts(walker.backward, 2)).toEqual([18 * DAY, 11 * DAY]);
    expect(starts(walker.forward, 1)).toEqual([25 * DAY]);
  });

  it('finds months, days of month and years', () => {
    expect(starts(walk(new Month(3), 0).forward, 1)).toEqual([59 * DAY]);
    expect(starts(walk(new DayOfMonth(31), 31 * DAY).forward, 1)).toEqual([89 * DAY]);
    expect(starts(walk(new Year(1971), 0).forward, 1)).toEqual([365 * DAY]);
    expect(starts(walk(new Year(1970), 40 * DAY).forward, 1)).toEqual([0]);
  });

  it('finds hours and minutes on both sides', () => {
    const hour = walk(new Hour(17), 20 * HOUR);
    expect(starts(hour.forward, 1)).toEqual([DAY + 17 * HOUR]);
    expect(starts(hour.backward, 1)).toEqual([17 * HOUR]);

    const minute = walk(new Minute(30), 0);
    expect(starts(minute.forward, 2)).toEqual([30 * 60, HOUR + 30 * 60]);
  });

  it('yields every unit for a cycle', () => {
    const walker = walk(new Cycle(Grain.DAY), DAY + 12 * HOUR);
    expect(starts(walker.forward, 2)).toEqual([DAY, 2 * DAY]);
    expect(starts(walker.backward, 2)).toEqual([0]);
  });

  it('never steps past the window maximum', () => {
    const window = { min: secondAt(0), max: secondAt(3 * DAY) };
    const walker = new DayOfWeek(1).toWalker(
      Interval.startingAt(Moment.fromSecs(0), Grain.SECOND),
      window,
    );
    expect(next(walker.forward)).toBeUndefined();
  });

  it('rejects out-of-range fields', () => {
    expect(() => new Month(13)).toThrow(InvalidConstraintError);
    expect(() => new DayOfWeek(0)).toThrow('dayOfWeek must be an integer in [1, 7], got 0');
    expect(() => new Hour(1.5)).toThrow(InvalidConstraintError);
  });
});
