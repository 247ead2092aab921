import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ResolverModule } from './resolver/resolver.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), ResolverModule],
})
export class AppModule {}
