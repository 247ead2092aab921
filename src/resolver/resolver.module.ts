import { Module } from '@nestjs/common';
import { ResolverService } from './resolver.service';
import { ResolverContextFactory } from './resolver-context.factory';
import { ResolverController } from './resolver.controller';

@Module({
  providers: [ResolverService, ResolverContextFactory],
  controllers: [ResolverController],
  exports: [ResolverService, ResolverContextFactory],
})
export class ResolverModule {}
