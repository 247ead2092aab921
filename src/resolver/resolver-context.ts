import { InvalidContextError } from '../common/errors';
import { Grain } from '../moment/grain';
import { Interval } from '../moment/interval';
import { Moment } from '../moment/moment';
import {
  DEFAULT_WINDOW,
  MAX_EPOCH_SECONDS,
  MIN_EPOCH_SECONDS,
  type TimeWindow,
} from '../moment/time-window';

/**
 * Reference "now" and admissible window for one resolution request.
 * Frozen after construction; share it across every value of the request.
 */
export class ResolverContext implements TimeWindow {
  constructor(
    readonly reference: Interval,
    readonly min: Interval,
    readonly max: Interval,
  ) {
    if (min.start.isAfter(reference.start) || reference.start.isAfter(max.start)) {
      throw new InvalidContextError(
        `Reference ${reference.start.epochSeconds}s lies outside [${min.start.epochSeconds}s, ${max.start.epochSeconds}s]`,
        {
          reference: reference.start.epochSeconds,
          min: min.start.epochSeconds,
          max: max.start.epochSeconds,
        },
      );
    }
    Object.freeze(this);
  }

  /**
   * Anchors the context on the second starting at `secs` (local clock).
   * Supports 1970 to 2038 so the same inputs resolve on 32-bit and 64-bit
   * time representations.
   */
  static fromSecs(secs: number): ResolverContext {
    if (
      !Number.isInteger(secs) ||
      secs < MIN_EPOCH_SECONDS ||
      secs > MAX_EPOCH_SECONDS
    ) {
      throw new InvalidContextError(
        `Epoch seconds must be an integer in [${MIN_EPOCH_SECONDS}, ${MAX_EPOCH_SECONDS}], got ${secs}`,
        { secs },
      );
    }
    return ResolverContext.forReference(
      Interval.startingAt(Moment.fromSecs(secs), Grain.SECOND),
    );
  }

  /** Context on the default 1970–2038 window. */
  static forReference(now: Interval): ResolverContext {
    return new ResolverContext(now, DEFAULT_WINDOW.min, DEFAULT_WINDOW.max);
  }
}
