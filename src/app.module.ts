import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { InfrastructureModule } from './infrastructure/infrastructure.module';
import { ApplicationModule } from './application/application.module';

/**
 * Application Module
 * Standalone context for the one-shot sync job (no HTTP server, no consumers)
 */
@Module({
  imports: [ConfigModule, SharedModule, InfrastructureModule, ApplicationModule],
})
export class AppModule {}
