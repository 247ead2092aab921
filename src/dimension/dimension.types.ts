import type { Duration } from 'date-fns';
import type { Constraint } from '../constraint/constraint.types';
import type { Grain } from '../moment/grain';

export type Precision = 'exact' | 'approximate';

export enum DatetimeKind {
  DATE = 'date',
  TIME = 'time',
  DATE_TIME = 'date-time',
  DATE_PERIOD = 'date-period',
  TIME_PERIOD = 'time-period',
  DATE_TIME_PERIOD = 'date-time-period',
  EMPTY = 'empty',
}

export interface DatetimeForm {
  /** Exclude a first candidate overlapping "now" ("next Tuesday" said on a Tuesday). */
  notImmediate?: boolean;
}

export type Bound = { type: 'start' } | { type: 'end'; onlyInterval: boolean };

export interface BoundedDirection {
  bound: Bound;
  direction: 'after' | 'before';
}

export interface DatetimeValue {
  kind: 'datetime';
  constraint: Constraint;
  form?: DatetimeForm;
  /** Present for open-ended ranges ("after 5pm", "before March"). */
  direction?: BoundedDirection;
  precision: Precision;
  latent: boolean;
  datetimeKind: DatetimeKind;
}

export interface NumberValue {
  kind: 'number';
  numberKind: 'integer' | 'float';
  value: number;
}

export interface OrdinalValue {
  kind: 'ordinal';
  value: number;
}

export interface AmountOfMoneyValue {
  kind: 'amount-of-money';
  value: number;
  precision: Precision;
  unit?: string; // ISO 4217 code or a currency symbol
}

export type TemperatureUnit = 'celsius' | 'fahrenheit' | 'kelvin' | 'degree';

export interface TemperatureValue {
  kind: 'temperature';
  value: number;
  unit?: TemperatureUnit;
  latent: boolean;
}

export interface DurationValue {
  kind: 'duration';
  period: Duration;
  precision: Precision;
}

export interface PercentageValue {
  kind: 'percentage';
  value: number;
}

// Intermediate values the grammar builds on the way; never resolved.
export interface MoneyUnitValue {
  kind: 'money-unit';
  unit: string;
}

export interface UnitOfDurationValue {
  kind: 'unit-of-duration';
  grain: Grain;
}

export interface CycleValue {
  kind: 'cycle';
  grain: Grain;
}

export interface RelativeMinuteValue {
  kind: 'relative-minute';
  value: number;
}

export type Dimension =
  | DatetimeValue
  | NumberValue
  | OrdinalValue
  | AmountOfMoneyValue
  | TemperatureValue
  | DurationValue
  | PercentageValue
  | MoneyUnitValue
  | UnitOfDurationValue
  | CycleValue
  | RelativeMinuteValue;

export type DimensionKind = Dimension['kind'];

export const DIMENSION_KINDS: readonly DimensionKind[] = [
  'datetime',
  'number',
  'ordinal',
  'amount-of-money',
  'temperature',
  'duration',
  'percentage',
  'money-unit',
  'unit-of-duration',
  'cycle',
  'relative-minute',
];

export const TEMPERATURE_UNITS: readonly TemperatureUnit[] = [
  'celsius',
  'fahrenheit',
  'kelvin',
  'degree',
];
