import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { SigningPoolHealthIndicator } from './indicators/signing-pool.health';
import { DiskSpaceHealthIndicator } from './indicators/disk-space.health';
import { ApplicationModule } from '../application/application.module';
import { SigningPoolModule } from '../signing-pool/signing-pool.module';

@Module({
  imports: [TerminusModule, ApplicationModule, SigningPoolModule],
  controllers: [HealthController],
  providers: [SigningPoolHealthIndicator, DiskSpaceHealthIndicator],
})
export class HealthModule {}
