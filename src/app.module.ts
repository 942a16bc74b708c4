import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { ApplicationModule } from './application/application.module';
import { InfrastructureModule } from './infrastructure/infrastructure.module';
import { ApiModule } from './api/api.module';
import { HealthModule } from './health/health.module';
import { LifecycleService } from './lifecycle/lifecycle.service';

/**
 * Application Module
 * HTTP service that accepts videos, signs them in the background and serves
 * the signed artifacts.
 */
@Module({
  imports: [
    ConfigModule,
    SharedModule,
    InfrastructureModule,
    ApplicationModule,
    ApiModule,
    HealthModule,
  ],
  providers: [LifecycleService],
})
export class AppModule {}
