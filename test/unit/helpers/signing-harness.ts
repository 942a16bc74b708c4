import * as path from 'path';
import { ContentHasherService } from '../../../src/shared/integrity/content-hasher.service';
import { FormatValidatorService } from '../../../src/shared/validation/format-validator.service';
import { InMemoryJobRecordRepositoryAdapter } from '../../../src/infrastructure/adapters/persistence/in-memory-job-record-repository.adapter';
import { LocalStagingStorageAdapter } from '../../../src/infrastructure/adapters/storage/local-staging-storage.adapter';
import { LocalArtifactStorageAdapter } from '../../../src/infrastructure/adapters/storage/local-artifact-storage.adapter';
import { SigningPoolService } from '../../../src/signing-pool/signing-pool.service';
import {
  GetSignedArtifactUseCase,
  GetSigningJobUseCase,
  ProcessSigningJobUseCase,
  RecoverInterruptedJobsUseCase,
  SubmitSigningJobUseCase,
} from '../../../src/application/use-cases';
import {
  InMemoryEventPublisherAdapter,
  ScriptedSigningInvokerAdapter,
} from '../../in-memory-adapters';
import { createConfigService, createSilentLogger, createTestConfig } from './mock-factories';

/**
 * Wires the use cases by hand over real local adapters rooted in `rootDir`,
 * with a scripted signer and a recording event publisher.
 */
export function createSigningHarness(rootDir: string, env: Record<string, string> = {}) {
  const config = createTestConfig({
    STAGING_DIR: path.join(rootDir, 'staging'),
    TEMP_DIR: path.join(rootDir, 'out'),
    ...env,
  });
  const configService = createConfigService(config);

  const contentHasher = new ContentHasherService(configService);
  const formatValidator = new FormatValidatorService(configService);
  const jobRepository = new InMemoryJobRecordRepositoryAdapter();
  const stagingStorage = new LocalStagingStorageAdapter(configService);
  const artifactStorage = new LocalArtifactStorageAdapter(configService);
  const eventPublisher = new InMemoryEventPublisherAdapter();
  const signer = new ScriptedSigningInvokerAdapter();
  const signingPool = new SigningPoolService(configService, createSilentLogger());

  const processSigningJob = new ProcessSigningJobUseCase(
    jobRepository,
    contentHasher,
    signer,
    artifactStorage,
    stagingStorage,
    eventPublisher,
  );
  const submitSigningJob = new SubmitSigningJobUseCase(
    formatValidator,
    contentHasher,
    stagingStorage,
    jobRepository,
    eventPublisher,
    signingPool,
    processSigningJob,
  );

  return {
    config,
    configService,
    contentHasher,
    jobRepository,
    stagingStorage,
    artifactStorage,
    eventPublisher,
    signer,
    signingPool,
    processSigningJob,
    submitSigningJob,
    getSigningJob: new GetSigningJobUseCase(jobRepository),
    getSignedArtifact: new GetSignedArtifactUseCase(jobRepository, artifactStorage),
    recoverInterruptedJobs: new RecoverInterruptedJobsUseCase(jobRepository, eventPublisher),
  };
}

export type SigningHarness = ReturnType<typeof createSigningHarness>;
