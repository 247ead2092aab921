import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InvalidContextError } from '../common/errors';
import {
  MAX_EPOCH_SECONDS,
  MIN_EPOCH_SECONDS,
  secondAt,
} from '../moment/time-window';
import { ResolverContext } from './resolver-context';

export interface ContextOptions {
  /** Epoch seconds; defaults to the current second. */
  reference?: number;
  min?: number;
  max?: number;
}

/** Builds per-request contexts, filling the window from configuration. */
@Injectable()
export class ResolverContextFactory {
  private readonly minEpoch: number;
  private readonly maxEpoch: number;

  constructor(private readonly config: ConfigService) {
    this.minEpoch = this.readEpoch('RESOLVER_MIN_EPOCH', MIN_EPOCH_SECONDS);
    this.maxEpoch = this.readEpoch('RESOLVER_MAX_EPOCH', MAX_EPOCH_SECONDS);
  }

  create(options: ContextOptions = {}): ResolverContext {
    const reference = options.reference ?? Math.floor(Date.now() / 1000);
    return new ResolverContext(
      secondAt(reference),
      secondAt(options.min ?? this.minEpoch),
      secondAt(options.max ?? this.maxEpoch),
    );
  }

  private readEpoch(key: string, fallback: number): number {
    const value = Number(this.config.get<string | number>(key) ?? fallback);
    if (!Number.isInteger(value)) {
      throw new InvalidContextError(`${key} must be an integer epoch second`, {
        [key]: value,
      });
    }
    return value;
  }
}
