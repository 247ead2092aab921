import { BadRequestException } from '@nestjs/common';
import {
  DatetimeKind,
  TEMPERATURE_UNITS,
  type Bound,
  type Dimension,
  type TemperatureUnit,
} from '../dimension/dimension.types';
import type { Grain } from '../moment/grain';
import { buildConstraint } from './constraint.builder';
import type { DimensionDto, DirectionDto } from './resolver.dto';

function required<T>(value: T | undefined, field: string, dto: DimensionDto): T {
  if (value === undefined) {
    throw new BadRequestException(`${dto.kind} dimension requires "${field}"`);
  }
  return value;
}

function toTemperatureUnit(unit: string): TemperatureUnit {
  const known = TEMPERATURE_UNITS.find((candidate) => candidate === unit);
  if (!known) {
    throw new BadRequestException(`Unknown temperature unit "${unit}"`);
  }
  return known;
}

function toBound(dto: DirectionDto): Bound {
  return dto.bound === 'start'
    ? { type: 'start' }
    : { type: 'end', onlyInterval: dto.onlyInterval ?? false };
}

export function toDimension(dto: DimensionDto): Dimension {
  const precision = dto.precision ?? 'exact';
  const latent = dto.latent ?? false;

  switch (dto.kind) {
    case 'datetime':
      return {
        kind: 'datetime',
        constraint: buildConstraint(required(dto.constraint, 'constraint', dto)),
        form: { notImmediate: dto.notImmediate ?? false },
        ...(dto.direction
          ? {
              direction: {
                bound: toBound(dto.direction),
                direction: dto.direction.direction,
              },
            }
          : {}),
        precision,
        latent,
        datetimeKind: dto.datetimeKind ?? DatetimeKind.DATE_TIME,
      };
    case 'number':
      return {
        kind: 'number',
        numberKind: dto.float ? 'float' : 'integer',
        value: required(dto.value, 'value', dto),
      };
    case 'ordinal':
      return { kind: 'ordinal', value: required(dto.value, 'value', dto) };
    case 'amount-of-money':
      return {
        kind: 'amount-of-money',
        value: required(dto.value, 'value', dto),
        precision,
        unit: dto.unit,
      };
    case 'temperature':
      return {
        kind: 'temperature',
        value: required(dto.value, 'value', dto),
        unit: dto.unit === undefined ? undefined : toTemperatureUnit(dto.unit),
        latent,
      };
    case 'duration':
      return {
        kind: 'duration',
        period: { ...required(dto.period, 'period', dto) },
        precision,
      };
    case 'percentage':
      return { kind: 'percentage', value: required(dto.value, 'value', dto) };
    case 'money-unit':
      return { kind: 'money-unit', unit: required(dto.unit, 'unit', dto) };
    case 'unit-of-duration':
      return {
        kind: 'unit-of-duration',
        grain: required<Grain>(dto.grain, 'grain', dto),
      };
    case 'cycle':
      return { kind: 'cycle', grain: required<Grain>(dto.grain, 'grain', dto) };
    case 'relative-minute':
      return { kind: 'relative-minute', value: required(dto.value, 'value', dto) };
  }
}
