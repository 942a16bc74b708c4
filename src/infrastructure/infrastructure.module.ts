import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigModule } from '../config/config.module';
import type { AppConfig } from '../config/configuration';

// Shared services (existing infrastructure)
import { S3Module } from '../shared/aws/s3/s3.module';
import { DynamoDbModule } from '../shared/aws/dynamodb/dynamodb.module';
import { LoggingModule } from '../shared/logging/logging.module';
import { S3Service } from '../shared/aws/s3/s3.service';
import { DynamoDbService } from '../shared/aws/dynamodb/dynamodb.service';

// Injection tokens (string symbols for DI)
import {
  ARTIFACT_STORAGE_PORT,
  EVENT_PUBLISHER_PORT,
  JOB_RECORD_REPOSITORY_PORT,
  SIGNING_INVOKER_PORT,
  STAGING_STORAGE_PORT,
} from '../application/ports/tokens';

// Adapters (implementations)
import type { JobRecordRepositoryPort } from '../application/ports/output/job-record-repository.port';
import type { ArtifactStoragePort } from '../application/ports/output/artifact-storage.port';
import { InMemoryJobRecordRepositoryAdapter } from './adapters/persistence/in-memory-job-record-repository.adapter';
import { DynamoDbJobRecordRepositoryAdapter } from './adapters/persistence/dynamodb-job-record-repository.adapter';
import { SignerProcessAdapter } from './adapters/signing/signer-process.adapter';
import { LocalStagingStorageAdapter } from './adapters/storage/local-staging-storage.adapter';
import { LocalArtifactStorageAdapter } from './adapters/storage/local-artifact-storage.adapter';
import { S3ArtifactStorageAdapter } from './adapters/storage/s3-artifact-storage.adapter';
import { LoggingEventPublisherAdapter } from './adapters/events/logging-event-publisher.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * The job record store and the artifact store are picked at startup from
 * `JOB_STORE_DRIVER` and `ARTIFACT_STORE_DRIVER`.
 */
@Module({
  imports: [ConfigModule, LoggingModule, S3Module, DynamoDbModule],
  providers: [
    // Persistence adapters
    {
      provide: JOB_RECORD_REPOSITORY_PORT,
      inject: [ConfigService, DynamoDbService],
      useFactory: (
        configService: ConfigService<AppConfig, true>,
        dynamoDb: DynamoDbService,
      ): JobRecordRepositoryPort =>
        configService.get('jobStore', { infer: true }).driver === 'dynamodb'
          ? new DynamoDbJobRecordRepositoryAdapter(dynamoDb)
          : new InMemoryJobRecordRepositoryAdapter(),
    },

    // Signing adapter
    SignerProcessAdapter,
    {
      provide: SIGNING_INVOKER_PORT,
      useExisting: SignerProcessAdapter,
    },

    // Storage adapters
    {
      provide: STAGING_STORAGE_PORT,
      useClass: LocalStagingStorageAdapter,
    },
    {
      provide: ARTIFACT_STORAGE_PORT,
      inject: [ConfigService, S3Service],
      useFactory: (
        configService: ConfigService<AppConfig, true>,
        s3Service: S3Service,
      ): ArtifactStoragePort =>
        configService.get('artifactStore', { infer: true }).driver === 's3'
          ? new S3ArtifactStorageAdapter(s3Service, configService)
          : new LocalArtifactStorageAdapter(configService),
    },

    // Event publisher adapter
    {
      provide: EVENT_PUBLISHER_PORT,
      useClass: LoggingEventPublisherAdapter,
    },
  ],
  exports: [
    // Export port tokens so they can be injected
    JOB_RECORD_REPOSITORY_PORT,
    SIGNING_INVOKER_PORT,
    STAGING_STORAGE_PORT,
    ARTIFACT_STORAGE_PORT,
    EVENT_PUBLISHER_PORT,
    SignerProcessAdapter,
  ],
})
export class InfrastructureModule {}
