import { InvalidContextError } from '../common/errors';
import { Grain } from '../moment/grain';
import { Interval } from '../moment/interval';
import { Moment } from '../moment/moment';
import { DEFAULT_WINDOW, MAX_EPOCH_SECONDS, secondAt } from '../moment/time-window';
import { ResolverContext } from './resolver-context';

describe('ResolverContext', () => {
  it('anchors fromSecs on a second-grain reference', () => {
    const context = ResolverContext.fromSecs(0);
    expect(context.reference.start.epochSeconds).toBe(0);
    expect(context.reference.grain).toBe(Grain.SECOND);
    expect(context.reference.end).toBeUndefined();
  });

  it('uses the default window for a bare reference', () => {
    const context = ResolverContext.forReference(secondAt(1_000));
    expect(context.min).toBe(DEFAULT_WINDOW.min);
    expect(context.max).toBe(DEFAULT_WINDOW.max);
  });

  it('accepts both ends of the supported range', () => {
    expect(ResolverContext.fromSecs(MAX_EPOCH_SECONDS).reference.start.epochSeconds).toBe(
      2_147_483_647,
    );
  });

  it('rejects epoch seconds it cannot represent', () => {
    expect(() => ResolverContext.fromSecs(-1)).toThrow(InvalidContextError);
    expect(() => ResolverContext.fromSecs(MAX_EPOCH_SECONDS + 1)).toThrow(
      InvalidContextError,
    );
    expect(() => ResolverContext.fromSecs(1.5)).toThrow(InvalidContextError);
  });

  it('fails fast when the reference lies outside min and max', () => {
    expect(
      () => new ResolverContext(secondAt(100), secondAt(200), secondAt(300)),
    ).toThrow(InvalidContextError);
    expect(
      () => new ResolverContext(secondAt(400), secondAt(200), secondAt(300)),
    ).toThrow(InvalidContextError);
  });

  it('reports references no Date can hold as invalid contexts', () => {
    expect(() => secondAt(1e20)).toThrow(InvalidContextError);
    expect(
      () => new ResolverContext(
        Interval.startingAt(Moment.fromSecs(1e16), Grain.SECOND),
        secondAt(0),
        secondAt(10),
      ),
    ).toThrow('Reference 10000000000000000s lies outside [0s, 10s]');
  });

  it('is frozen', () => {
    const context = new ResolverContext(secondAt(250), secondAt(200), secondAt(300));
    expect(Object.isFrozen(context)).toBe(true);
  });
});
