import { Body, Controller, Post } from '@nestjs/common';
import { ResolverService } from './resolver.service';
import { ResolverContextFactory } from './resolver-context.factory';
import { ResolveRequestDto } from './resolver.dto';
import { toDimension } from './dimension.mapper';

@Controller('resolver')
export class ResolverController {
  constructor(
    private readonly resolver: ResolverService,
    private readonly contexts: ResolverContextFactory,
  ) {}

  @Post('resolve')
  resolve(@Body() dto: ResolveRequestDto) {
    const context = this.contexts.create(dto);
    const dimensions = dto.dimensions.map(toDimension);
    const results = this.resolver.resolveAll(context, dimensions);
    return {
      reference: context.reference.start,
      results: results.map((output) => output ?? null),
    };
  }
}
