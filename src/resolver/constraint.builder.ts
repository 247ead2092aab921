import {
  DayOfMonth,
  DayOfWeek,
  Hour,
  Minute,
  Month,
  Year,
} from '../constraint/calendar.constraints';
import type { Constraint } from '../constraint/constraint.types';
import { CycleNth } from '../constraint/cycle-nth.constraint';
import { Intersection } from '../constraint/intersection.constraint';
import { Span } from '../constraint/span.constraint';
import { InvalidConstraintError } from '../common/errors';
import type { ConstraintDto } from './resolver.dto';

/** Intersects every calendar field set on the DTO; `until` makes a span. */
export function buildConstraint(dto: ConstraintDto): Constraint {
  const parts: Constraint[] = [];
  if (dto.cycle) parts.push(new CycleNth(dto.cycle.grain, dto.cycle.offset));
  if (dto.year !== undefined) parts.push(new Year(dto.year));
  if (dto.month !== undefined) parts.push(new Month(dto.month));
  if (dto.dayOfMonth !== undefined) parts.push(new DayOfMonth(dto.dayOfMonth));
  if (dto.dayOfWeek !== undefined) parts.push(new DayOfWeek(dto.dayOfWeek));
  if (dto.hour !== undefined) parts.push(new Hour(dto.hour));
  if (dto.minute !== undefined) parts.push(new Minute(dto.minute));

  const [first, ...rest] = parts;
  if (!first) {
    throw new InvalidConstraintError('A constraint needs at least one field');
  }
  const combined = rest.reduce<Constraint>(
    (acc, part) => new Intersection(acc, part),
    first,
  );

  return dto.until
    ? new Span(combined, buildConstraint(dto.until), dto.inclusive ?? true)
    : combined;
}
