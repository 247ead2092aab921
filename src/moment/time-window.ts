import { InvalidContextError } from '../common/errors';
import { Grain } from './grain';
import { Interval } from './interval';
import { Moment } from './moment';

/** Admissible resolution range. Walkers never step past it. */
export interface TimeWindow {
  readonly min: Interval;
  readonly max: Interval;
}

// Keeps every anchor representable as a signed 32-bit epoch (1970–2038).
export const MIN_EPOCH_SECONDS = 0;
export const MAX_EPOCH_SECONDS = 2_147_483_647;

// Outermost seconds a Date can hold (±8.64e15 ms around the epoch).
export const MAX_REPRESENTABLE_SECONDS = 8_640_000_000_000;

export function secondAt(epochSeconds: number): Interval {
  if (
    !Number.isInteger(epochSeconds) ||
    Math.abs(epochSeconds) > MAX_REPRESENTABLE_SECONDS
  ) {
    throw new InvalidContextError(
      `Epoch seconds must be an integer within ±${MAX_REPRESENTABLE_SECONDS}, got ${epochSeconds}`,
      { epochSeconds },
    );
  }
  return Interval.startingAt(Moment.fromSecs(epochSeconds), Grain.SECOND);
}

export const DEFAULT_WINDOW: TimeWindow = Object.freeze({
  min: secondAt(MIN_EPOCH_SECONDS),
  max: secondAt(MAX_EPOCH_SECONDS),
});
