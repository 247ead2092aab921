import {
  addDays,
  addHours,
  addMinutes,
  addMonths,
  addQuarters,
  addSeconds,
  addWeeks,
  addYears,
  formatISO,
  getDate,
  getHours,
  getISODay,
  getMinutes,
  getMonth,
  getYear,
  startOfDay,
  startOfHour,
  startOfMinute,
  startOfMonth,
  startOfQuarter,
  startOfSecond,
  startOfWeek,
  startOfYear,
} from 'date-fns';
import { Grain } from './grain';

/**
 * Immutable point in time on the process-local clock.
 *
 * Calendar arithmetic goes through date-fns, so month lengths, leap years and
 * DST shifts follow the local timezone.
 */
export class Moment {
  private constructor(readonly epochMillis: number) {}

  static fromSecs(secs: number): Moment {
    return new Moment(secs * 1000);
  }

  static fromDate(date: Date): Moment {
    return new Moment(date.getTime());
  }

  /** Local wall-clock time. `month` is 1-based. */
  static local(
    year: number,
    month: number,
    day = 1,
    hour = 0,
    minute = 0,
    second = 0,
  ): Moment {
    return Moment.fromDate(new Date(year, month - 1, day, hour, minute, second));
  }

  static max(a: Moment, b: Moment): Moment {
    return a.isBefore(b) ? b : a;
  }

  static min(a: Moment, b: Moment): Moment {
    return a.isAfter(b) ? b : a;
  }

  get epochSeconds(): number {
    return Math.floor(this.epochMillis / 1000);
  }

  get year(): number {
    return getYear(this.toDate());
  }

  /** 1 = January. */
  get month(): number {
    return getMonth(this.toDate()) + 1;
  }

  get dayOfMonth(): number {
    return getDate(this.toDate());
  }

  /** ISO weekday, 1 = Monday … 7 = Sunday. */
  get isoWeekday(): number {
    return getISODay(this.toDate());
  }

  get hour(): number {
    return getHours(this.toDate());
  }

  get minute(): number {
    return getMinutes(this.toDate());
  }

  add(grain: Grain, amount: number): Moment {
    const date = this.toDate();
    switch (grain) {
      case Grain.SECOND:
        return Moment.fromDate(addSeconds(date, amount));
      case Grain.MINUTE:
        return Moment.fromDate(addMinutes(date, amount));
      case Grain.HOUR:
        return Moment.fromDate(addHours(date, amount));
      case Grain.DAY:
        return Moment.fromDate(addDays(date, amount));
      case Grain.WEEK:
        return Moment.fromDate(addWeeks(date, amount));
      case Grain.MONTH:
        return Moment.fromDate(addMonths(date, amount));
      case Grain.QUARTER:
        return Moment.fromDate(addQuarters(date, amount));
      case Grain.YEAR:
        return Moment.fromDate(addYears(date, amount));
    }
  }

  /** Start of the grain unit containing this moment. Weeks start on Monday. */
  startOf(grain: Grain): Moment {
    const date = this.toDate();
    switch (grain) {
      case Grain.SECOND:
        return Moment.fromDate(startOfSecond(date));
      case Grain.MINUTE:
        return Moment.fromDate(startOfMinute(date));
      case Grain.HOUR:
        return Moment.fromDate(startOfHour(date));
      case Grain.DAY:
        return Moment.fromDate(startOfDay(date));
      case Grain.WEEK:
        return Moment.fromDate(startOfWeek(date, { weekStartsOn: 1 }));
      case Grain.MONTH:
        return Moment.fromDate(startOfMonth(date));
      case Grain.QUARTER:
        return Moment.fromDate(startOfQuarter(date));
      case Grain.YEAR:
        return Moment.fromDate(startOfYear(date));
    }
  }

  compare(other: Moment): number {
    return this.epochMillis - other.epochMillis;
  }

  isBefore(other: Moment): boolean {
    return this.epochMillis < other.epochMillis;
  }

  isAfter(other: Moment): boolean {
    return this.epochMillis > other.epochMillis;
  }

  equals(other: Moment): boolean {
    return this.epochMillis === other.epochMillis;
  }

  toDate(): Date {
    return new Date(this.epochMillis);
  }

  /** ISO 8601 with the local offset ("Z" on a UTC clock). */
  toISOString(): string {
    return formatISO(this.toDate());
  }

  toJSON(): string {
    return this.toISOString();
  }

  toString(): string {
    return this.toISOString();
  }
}
