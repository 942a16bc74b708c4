import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { SharedModule } from '../shared/shared.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { SigningPoolModule } from '../signing-pool/signing-pool.module';

// Use Cases
import {
  SubmitSigningJobUseCase,
  ProcessSigningJobUseCase,
  GetSigningJobUseCase,
  GetSignedArtifactUseCase,
  CheckDependenciesUseCase,
  RecoverInterruptedJobsUseCase,
} from './use-cases';

/**
 * Application Module
 * Contains all use cases and application services
 *
 * Use cases depend on output ports (interfaces) only. The implementations
 * (adapters) come from the InfrastructureModule and the SigningPoolModule.
 */
@Module({
  imports: [ConfigModule, SharedModule, InfrastructureModule, SigningPoolModule],
  providers: [
    // Use Cases
    SubmitSigningJobUseCase,
    ProcessSigningJobUseCase,
    GetSigningJobUseCase,
    GetSignedArtifactUseCase,
    CheckDependenciesUseCase,
    RecoverInterruptedJobsUseCase,
  ],
  exports: [
    // Export use cases so they can be used by driving adapters (controllers)
    SubmitSigningJobUseCase,
    GetSigningJobUseCase,
    GetSignedArtifactUseCase,
    CheckDependenciesUseCase,
    RecoverInterruptedJobsUseCase,
  ],
})
export class ApplicationModule {}
