import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { ConstraintDto, DimensionDto, ResolveRequestDto } from './resolver.dto';

function check(body: object) {
  return validate(plainToInstance(ResolveRequestDto, body));
}

describe('ResolveRequestDto', () => {
  it('accepts a well-formed request and builds nested DTOs', async () => {
    const dto = plainToInstance(ResolveRequestDto, {
      reference: 0,
      dimensions: [
        { kind: 'datetime', constraint: { dayOfWeek: 1, until: { dayOfWeek: 3 } } },
        { kind: 'duration', period: { days: 2 } },
      ],
    });

    expect(await validate(dto)).toEqual([]);
    expect(dto.dimensions[0]).toBeInstanceOf(DimensionDto);
    expect(dto.dimensions[0].constraint).toBeInstanceOf(ConstraintDto);
    expect(dto.dimensions[0].constraint?.until).toBeInstanceOf(ConstraintDto);
  });

  it('rejects an out-of-range weekday', async () => {
    const errors = await check({
      dimensions: [{ kind: 'datetime', constraint: { dayOfWeek: 8 } }],
    });
    expect(errors).toHaveLength(1);
    expect(errors[0].property).toBe('dimensions');
  });

  it('requires a constraint for datetimes and a value for scalars', async () => {
    expect(await check({ dimensions: [{ kind: 'datetime' }] })).toHaveLength(1);
    expect(await check({ dimensions: [{ kind: 'ordinal' }] })).toHaveLength(1);
  });

  it('bounds epoch fields to what a Date can hold', async () => {
    const errors = await check({ reference: 1e20, dimensions: [{ kind: 'ordinal', value: 2 }] });
    expect(errors).toHaveLength(1);
    expect(errors[0].property).toBe('reference');
    expect(errors[0].constraints).toHaveProperty('max');
  });

  it('rejects unknown kinds and empty batches', async () => {
    expect(await check({ dimensions: [{ kind: 'weather' }] })).toHaveLength(1);

    const errors = await check({ dimensions: [] });
    expect(errors[0].constraints).toHaveProperty('arrayMinSize');
  });
});
