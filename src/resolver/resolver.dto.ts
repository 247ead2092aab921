import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsEnum,
  IsIn,
  IsInt,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import {
  DatetimeKind,
  DIMENSION_KINDS,
  type DimensionKind,
  type Precision,
} from '../dimension/dimension.types';
import { Grain, GRAINS } from '../moment/grain';
import { MAX_REPRESENTABLE_SECONDS } from '../moment/time-window';

export class CycleDto {
  @IsIn(GRAINS)
  grain!: Grain;

  @IsInt()
  offset!: number;
}

/**
 * Calendar fields of a datetime. Every field set narrows the candidates;
 * `until` turns the result into a span ending at the nested constraint.
 */
export class ConstraintDto {
  @IsOptional()
  @IsInt()
  @Min(1970)
  @Max(2038)
  year?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(12)
  month?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(31)
  dayOfMonth?: number;

  /** ISO weekday, 1 = Monday. */
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(7)
  dayOfWeek?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(23)
  hour?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(59)
  minute?: number;

  @IsOptional()
  @ValidateNested()
  @Type(() => CycleDto)
  cycle?: CycleDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => ConstraintDto)
  until?: ConstraintDto;

  @IsOptional()
  @IsBoolean()
  inclusive?: boolean;
}

export class DirectionDto {
  @IsIn(['start', 'end'])
  bound!: 'start' | 'end';

  @IsOptional()
  @IsBoolean()
  onlyInterval?: boolean;

  @IsIn(['after', 'before'])
  direction!: 'after' | 'before';
}

export class PeriodDto {
  @IsOptional() @IsInt() years?: number;
  @IsOptional() @IsInt() months?: number;
  @IsOptional() @IsInt() weeks?: number;
  @IsOptional() @IsInt() days?: number;
  @IsOptional() @IsInt() hours?: number;
  @IsOptional() @IsInt() minutes?: number;
  @IsOptional() @IsInt() seconds?: number;
}

const SCALAR_KINDS: readonly DimensionKind[] = [
  'number',
  'ordinal',
  'amount-of-money',
  'temperature',
  'percentage',
  'relative-minute',
];

export class DimensionDto {
  @IsIn(DIMENSION_KINDS)
  kind!: DimensionKind;

  @ValidateIf((o: DimensionDto) => o.kind === 'datetime')
  @IsObject()
  @ValidateNested()
  @Type(() => ConstraintDto)
  constraint?: ConstraintDto;

  @IsOptional()
  @IsBoolean()
  notImmediate?: boolean;

  @IsOptional()
  @ValidateNested()
  @Type(() => DirectionDto)
  direction?: DirectionDto;

  @IsOptional()
  @IsEnum(DatetimeKind)
  datetimeKind?: DatetimeKind;

  @IsOptional()
  @IsIn(['exact', 'approximate'])
  precision?: Precision;

  @IsOptional()
  @IsBoolean()
  latent?: boolean;

  @ValidateIf((o: DimensionDto) => SCALAR_KINDS.includes(o.kind))
  @IsNumber()
  value?: number;

  /** Number kind only: integer unless set to true. */
  @IsOptional()
  @IsBoolean()
  float?: boolean;

  @IsOptional()
  @IsString()
  unit?: string;

  @ValidateIf((o: DimensionDto) => o.kind === 'duration')
  @IsObject()
  @ValidateNested()
  @Type(() => PeriodDto)
  period?: PeriodDto;

  @ValidateIf(
    (o: DimensionDto) => o.kind === 'unit-of-duration' || o.kind === 'cycle',
  )
  @IsIn(GRAINS)
  grain?: Grain;
}

export class ResolveRequestDto {
  /** Epoch seconds of "now"; defaults to the server clock. */
  @IsOptional()
  @IsInt()
  @Min(-MAX_REPRESENTABLE_SECONDS)
  @Max(MAX_REPRESENTABLE_SECONDS)
  reference?: number;

  @IsOptional()
  @IsInt()
  @Min(-MAX_REPRESENTABLE_SECONDS)
  @Max(MAX_REPRESENTABLE_SECONDS)
  min?: number;

  @IsOptional()
  @IsInt()
  @Min(-MAX_REPRESENTABLE_SECONDS)
  @Max(MAX_REPRESENTABLE_SECONDS)
  max?: number;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => DimensionDto)
  dimensions!: DimensionDto[];
}
