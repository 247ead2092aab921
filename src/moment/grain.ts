/** Calendar granularity an interval is aligned to, finest first. */
export enum Grain {
  SECOND = 'second',
  MINUTE = 'minute',
  HOUR = 'hour',
  DAY = 'day',
  WEEK = 'week',
  MONTH = 'month',
  QUARTER = 'quarter',
  YEAR = 'year',
}

export const GRAINS: readonly Grain[] = [
  Grain.SECOND,
  Grain.MINUTE,
  Grain.HOUR,
  Grain.DAY,
  Grain.WEEK,
  Grain.MONTH,
  Grain.QUARTER,
  Grain.YEAR,
];

/** True when `a` is strictly finer than `b`. */
export function isFiner(a: Grain, b: Grain): boolean {
  return GRAINS.indexOf(a) < GRAINS.indexOf(b);
}

export function finest(a: Grain, b: Grain): Grain {
  return isFiner(b, a) ? b : a;
}
