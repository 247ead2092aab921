import { ConfigService } from '@nestjs/config';
import { InvalidContextError } from '../common/errors';
import { MAX_EPOCH_SECONDS } from '../moment/time-window';
import { ResolverContextFactory } from './resolver-context.factory';

describe('ResolverContextFactory', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reads the window from configuration', () => {
    const factory = new ResolverContextFactory(
      new ConfigService({ RESOLVER_MIN_EPOCH: '100', RESOLVER_MAX_EPOCH: '900' }),
    );
    const context = factory.create({ reference: 500 });
    expect(context.min.start.epochSeconds).toBe(100);
    expect(context.max.start.epochSeconds).toBe(900);
    expect(context.reference.start.epochSeconds).toBe(500);
  });

  it('lets the request override the window', () => {
    const factory = new ResolverContextFactory(new ConfigService());
    const context = factory.create({ reference: 50, min: 10, max: 60 });
    expect(context.min.start.epochSeconds).toBe(10);
    expect(context.max.start.epochSeconds).toBe(60);
  });

  it('defaults the reference to the current second', () => {
    jest.spyOn(Date, 'now').mockReturnValue(1_000_500);
    const context = new ResolverContextFactory(new ConfigService()).create();
    expect(context.reference.start.epochSeconds).toBe(1_000);
    expect(context.max.start.epochSeconds).toBe(MAX_EPOCH_SECONDS);
  });

  it('refuses a non-numeric window bound', () => {
    expect(
      () => new ResolverContextFactory(new ConfigService({ RESOLVER_MIN_EPOCH: 'soon' })),
    ).toThrow(InvalidContextError);
  });
});
