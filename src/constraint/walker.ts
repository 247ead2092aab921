import type { Grain } from '../moment/grain';
import { Interval } from '../moment/interval';
import type { Moment } from '../moment/moment';
import type { TimeWindow } from '../moment/time-window';
import type { Walker } from './constraint.types';

export function walkerOf(
  forward: Iterable<Interval>,
  backward: Iterable<Interval>,
): Walker {
  return {
    forward: forward[Symbol.iterator](),
    backward: backward[Symbol.iterator](),
  };
}

export function emptyWalker(): Walker {
  return walkerOf([], []);
}

/** Pulls one element, or undefined once the sequence is exhausted. */
export function next(iterator: Iterator<Interval>): Interval | undefined {
  const result = iterator.next();
  return result.done ? undefined : result.value;
}

export function* iterate(iterator: Iterator<Interval>): Generator<Interval> {
  for (let item = next(iterator); item; item = next(iterator)) {
    yield item;
  }
}

export function* prepend(
  head: Interval,
  rest: Iterator<Interval>,
): Generator<Interval> {
  yield head;
  yield* iterate(rest);
}

export function* filter(
  source: Iterable<Interval>,
  predicate: (interval: Interval) => boolean,
): Generator<Interval> {
  for (const interval of source) {
    if (predicate(interval)) yield interval;
  }
}

/** Consecutive grain units from `from` onwards. Stops past `window.max`. */
export function* ascending(
  from: Moment,
  grain: Grain,
  window: TimeWindow,
): Generator<Interval> {
  for (let i = 0; ; i++) {
    const start = from.add(grain, i);
    if (start.isAfter(window.max.start)) return;
    yield Interval.startingAt(start, grain);
  }
}

/** Consecutive grain units from `from` backwards. Stops before `window.min`. */
export function* descending(
  from: Moment,
  grain: Grain,
  window: TimeWindow,
): Generator<Interval> {
  for (let i = 0; ; i++) {
    const start = from.add(grain, -i);
    if (start.isBefore(window.min.start)) return;
    yield Interval.startingAt(start, grain);
  }
}
