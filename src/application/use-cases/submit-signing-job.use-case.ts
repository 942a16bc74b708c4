import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import type {
  SubmitSigningJobCommand,
  SubmitSigningJobPort,
  SubmitSigningJobResult,
} from '../ports/input/submit-signing-job.port';
import type { JobRecordRepositoryPort } from '../ports/output/job-record-repository.port';
import type { StagingStoragePort } from '../ports/output/staging-storage.port';
import type { EventPublisherPort } from '../ports/output/event-publisher.port';
import { SHUTDOWN_CANCEL_REASON, type SigningPoolPort } from '../ports/output/signing-pool.port';
import {
  EVENT_PUBLISHER_PORT,
  JOB_RECORD_REPOSITORY_PORT,
  SIGNING_POOL_PORT,
  STAGING_STORAGE_PORT,
} from '../ports/tokens';
import { ProcessSigningJobUseCase } from './process-signing-job.use-case';
import { FormatValidatorService, extractExtension } from '../../shared/validation/format-validator.service';
import { ContentHasherService } from '../../shared/integrity/content-hasher.service';
import { SigningJobEntity } from '../../domain/entities/signing-job.entity';
import { SigningJobSubmittedEvent } from '../../domain/events/signing-job-submitted.event';
import { parseDeviceInfo } from '../../domain/value-objects/device-info.vo';
import {
  ServiceBusyError,
  StagingError,
  ValidationError,
  errorMessage,
} from '../../domain/errors/signing-service.errors';

/**
 * Submit Signing Job Use Case
 *
 * Synchronous half of a submission. Once this resolves the job is durable in
 * `processing` and its background unit has been handed to the signing pool;
 * the caller never waits for the signer.
 *
 * A pool slot is reserved before anything is staged and held until the job
 * is scheduled, so concurrent submissions are refused before a record exists.
 * Nothing is left behind when it rejects: no record for validation, capacity
 * and staging failures, and the staged bytes are removed on every later
 * failure.
 */
@Injectable()
export class SubmitSigningJobUseCase implements SubmitSigningJobPort {
  private readonly logger = new Logger(SubmitSigningJobUseCase.name);

  constructor(
    private readonly formatValidator: FormatValidatorService,
    private readonly contentHasher: ContentHasherService,
    @Inject(STAGING_STORAGE_PORT)
    private readonly stagingStorage: StagingStoragePort,
    @Inject(JOB_RECORD_REPOSITORY_PORT)
    private readonly jobRepository: JobRecordRepositoryPort,
    @Inject(EVENT_PUBLISHER_PORT)
    private readonly eventPublisher: EventPublisherPort,
    @Inject(SIGNING_POOL_PORT)
    private readonly signingPool: SigningPoolPort,
    private readonly processSigningJob: ProcessSigningJobUseCase,
  ) {}

  async execute(command: SubmitSigningJobCommand): Promise<SubmitSigningJobResult> {
    if (!this.formatValidator.isSupported(command.originalName)) {
      await this.discardUpload(command.sourcePath);
      throw ValidationError.unsupportedFormat(
        command.originalName,
        this.formatValidator.getAcceptedFormats(),
      );
    }

    const jobId = uuidv4();
    try {
      this.signingPool.reserve(jobId);
    } catch (error) {
      await this.discardUpload(command.sourcePath);
      throw error;
    }

    try {
      return await this.accept(jobId, command);
    } finally {
      this.signingPool.release(jobId);
    }
  }

  private async accept(
    jobId: string,
    command: SubmitSigningJobCommand,
  ): Promise<SubmitSigningJobResult> {
    const stagedPath = await this.stage(jobId, command);
    const contentHash = await this.hashStaged(jobId, stagedPath);

    const deviceInfo = parseDeviceInfo(command.deviceInfo);
    if (deviceInfo.status === 'malformed') {
      this.logger.warn(`Ignoring malformed device info for job ${jobId}: ${deviceInfo.reason}`);
    }

    const job = SigningJobEntity.create({
      jobId,
      originalName: command.originalName,
      contentHash,
      deviceInfo: deviceInfo.status === 'parsed' ? deviceInfo.value : undefined,
    });

    try {
      await this.jobRepository.create(job);
    } catch (error) {
      this.logger.error(`Failed to create record for job ${jobId}: ${errorMessage(error)}`);
      await this.stagingStorage.remove(stagedPath);
      throw error;
    }

    this.eventPublisher.publishAsync(
      new SigningJobSubmittedEvent({
        jobId,
        originalName: command.originalName,
        contentHash,
        hasDeviceInfo: job.deviceInfo !== undefined,
      }),
    );

    await this.schedule(jobId, stagedPath);

    this.logger.log(`Accepted job ${jobId} (${command.originalName})`);

    return { jobId, status: 'processing', contentHash };
  }

  private async stage(jobId: string, command: SubmitSigningJobCommand): Promise<string> {
    try {
      return await this.stagingStorage.stage(
        jobId,
        extractExtension(command.originalName),
        command.sourcePath,
      );
    } catch (error) {
      await this.discardUpload(command.sourcePath);
      throw new StagingError(`Failed to stage upload: ${errorMessage(error)}`, error);
    }
  }

  private async hashStaged(jobId: string, stagedPath: string): Promise<string> {
    try {
      return await this.contentHasher.hashFile(stagedPath);
    } catch (error) {
      this.logger.error(`Failed to hash staged upload for job ${jobId}: ${errorMessage(error)}`);
      await this.stagingStorage.remove(stagedPath);
      throw new StagingError(`Failed to read staged upload: ${errorMessage(error)}`, error);
    }
  }

  private async schedule(jobId: string, stagedPath: string): Promise<void> {
    const unit = { jobId, stagedPath };

    try {
      this.signingPool.schedule({
        id: jobId,
        run: async () => {
          await this.processSigningJob.execute(unit);
        },
        cancel: async (reason) => {
          await this.processSigningJob.cancel(unit, reason);
        },
      });
    } catch (error) {
      // The record already exists; it must not stay in processing.
      const reason =
        error instanceof ServiceBusyError && error.shuttingDown
          ? SHUTDOWN_CANCEL_REASON
          : `Signing cancelled: ${errorMessage(error)}`;
      await this.processSigningJob.cancel(unit, reason);
      throw error instanceof ServiceBusyError ? error : new ServiceBusyError(errorMessage(error));
    }
  }

  private async discardUpload(sourcePath: string): Promise<void> {
    try {
      await this.stagingStorage.remove(sourcePath);
    } catch (error) {
      this.logger.warn(`Failed to remove upload ${sourcePath}: ${errorMessage(error)}`);
    }
  }
}
