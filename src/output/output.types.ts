import type { Duration } from 'date-fns';
import type {
  DatetimeKind,
  Precision,
  TemperatureUnit,
} from '../dimension/dimension.types';
import type { Grain } from '../moment/grain';
import type { Moment } from '../moment/moment';

export interface DatetimeOutput {
  kind: 'datetime';
  moment: Moment;
  grain: Grain;
  precision: Precision;
  latent: boolean;
  datetimeKind: DatetimeKind;
}

export type DatetimeIntervalKind =
  | {
      type: 'between';
      start: Moment;
      end: Moment;
      precision: Precision;
      latent: boolean;
    }
  | { type: 'after'; value: DatetimeOutput }
  | { type: 'before'; value: DatetimeOutput };

export interface DatetimeIntervalOutput {
  kind: 'datetime-interval';
  intervalKind: DatetimeIntervalKind;
  datetimeKind: DatetimeKind;
}

export interface IntegerOutput {
  kind: 'integer';
  value: number;
}

export interface FloatOutput {
  kind: 'float';
  value: number;
}

export interface OrdinalOutput {
  kind: 'ordinal';
  value: number;
}

export interface AmountOfMoneyOutput {
  kind: 'amount-of-money';
  value: number;
  precision: Precision;
  unit?: string;
}

export interface TemperatureOutput {
  kind: 'temperature';
  value: number;
  unit?: TemperatureUnit;
  latent: boolean;
}

export interface DurationOutput {
  kind: 'duration';
  period: Duration;
  precision: Precision;
}

export interface PercentageOutput {
  kind: 'percentage';
  value: number;
}

/** Concrete value handed to the caller. Moments serialise as ISO 8601. */
export type Output =
  | DatetimeOutput
  | DatetimeIntervalOutput
  | IntegerOutput
  | FloatOutput
  | OrdinalOutput
  | AmountOfMoneyOutput
  | TemperatureOutput
  | DurationOutput
  | PercentageOutput;
