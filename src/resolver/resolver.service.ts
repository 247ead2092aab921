import { Injectable, Logger } from '@nestjs/common';
import {
  DatetimeKind,
  type BoundedDirection,
  type DatetimeValue,
  type Dimension,
} from '../dimension/dimension.types';
import type { Interval } from '../moment/interval';
import type { Moment } from '../moment/moment';
import type { DatetimeOutput, Output } from '../output/output.types';
import { selectCandidate } from './candidate';
import type { ParsingContext } from './parsing-context';
import type { ResolverContext } from './resolver-context';

@Injectable()
export class ResolverService {
  private readonly logger = new Logger(ResolverService.name);

  /**
   * Resolves one value against the context.
   * @returns undefined for kinds with no concrete output, and for datetimes
   * without any candidate inside the context window
   */
  resolve(context: ResolverContext, dimension: Dimension): Output | undefined {
    switch (dimension.kind) {
      case 'datetime':
        return this.resolveDatetime(context, dimension);
      case 'number':
        return dimension.numberKind === 'integer'
          ? { kind: 'integer', value: dimension.value }
          : { kind: 'float', value: dimension.value };
      case 'ordinal':
        return { kind: 'ordinal', value: dimension.value };
      case 'amount-of-money':
        return {
          kind: 'amount-of-money',
          value: dimension.value,
          precision: dimension.precision,
          unit: dimension.unit,
        };
      case 'temperature':
        return {
          kind: 'temperature',
          value: dimension.value,
          unit: dimension.unit,
          latent: dimension.latent,
        };
      case 'duration':
        return {
          kind: 'duration',
          period: { ...dimension.period },
          precision: dimension.precision,
        };
      case 'percentage':
        return { kind: 'percentage', value: dimension.value };
      case 'money-unit':
      case 'unit-of-duration':
      case 'cycle':
      case 'relative-minute':
        return undefined;
      default: {
        const unhandled: never = dimension;
        return unhandled;
      }
    }
  }

  resolveAll(
    context: ResolverContext,
    dimensions: readonly Dimension[],
  ): (Output | undefined)[] {
    return dimensions.map((dimension) => this.resolve(context, dimension));
  }

  /** A ParsingContext resolving every value against one context. */
  bind(context: ResolverContext): ParsingContext<Dimension, Output> {
    return { resolve: (dimension) => this.resolve(context, dimension) };
  }

  private resolveDatetime(
    context: ResolverContext,
    value: DatetimeValue,
  ): Output | undefined {
    const walker = value.constraint.toWalker(context.reference, context);
    const interval = selectCandidate(
      walker,
      context.reference,
      value.form?.notImmediate ?? false,
    );
    if (!interval) {
      this.logger.debug(
        `No candidate around ${context.reference} for ${value.datetimeKind}`,
      );
      return undefined;
    }

    if (value.direction) {
      return this.toDirectional(interval, value, value.direction);
    }

    if (interval.end) {
      if (
        value.datetimeKind === DatetimeKind.DATE ||
        value.datetimeKind === DatetimeKind.TIME
      ) {
        this.logger.warn(`${value.datetimeKind} kind with an interval - ${interval}`);
      }
      return {
        kind: 'datetime-interval',
        intervalKind: {
          type: 'between',
          start: interval.start,
          end: interval.end,
          precision: value.precision,
          latent: value.latent,
        },
        datetimeKind: value.datetimeKind,
      };
    }

    return this.toDatetime(interval.start, interval, value);
  }

  private toDirectional(
    interval: Interval,
    value: DatetimeValue,
    { bound, direction }: BoundedDirection,
  ): Output {
    let anchor: Moment;
    if (bound.type === 'start') {
      anchor = interval.start;
    } else if (bound.onlyInterval) {
      anchor = interval.end ?? interval.start;
    } else {
      anchor = interval.endMoment();
    }

    const payload = this.toDatetime(anchor, interval, value);
    return {
      kind: 'datetime-interval',
      intervalKind:
        direction === 'after'
          ? { type: 'after', value: payload }
          : { type: 'before', value: payload },
      // Taken from the payload, not the incoming value.
      datetimeKind: payload.datetimeKind,
    };
  }

  private toDatetime(
    moment: Moment,
    interval: Interval,
    value: DatetimeValue,
  ): DatetimeOutput {
    return {
      kind: 'datetime',
      moment,
      grain: interval.grain,
      precision: value.precision,
      latent: value.latent,
      datetimeKind: value.datetimeKind,
    };
  }
}
