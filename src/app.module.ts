import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ResolverModule } from './infrastructure/http/resolver.module';
import { scraperConfig } from './shared/config/scraper.config';
import { ApiKeyGuard } from './infrastructure/auth/api-key.guard';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [scraperConfig],
      envFilePath: ['.env', '.env.local'],
    }),
    ResolverModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ApiKeyGuard,
    },
  ],
})
export class AppModule {}
