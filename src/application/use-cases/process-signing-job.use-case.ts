import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  ProcessSigningJobCommand,
  ProcessSigningJobPort,
  ProcessSigningJobResult,
} from '../ports/input/process-signing-job.port';
import type { JobRecordRepositoryPort } from '../ports/output/job-record-repository.port';
import type { SigningInvokerPort } from '../ports/output/signing-invoker.port';
import type { ArtifactStoragePort } from '../ports/output/artifact-storage.port';
import type { StagingStoragePort } from '../ports/output/staging-storage.port';
import type { EventPublisherPort } from '../ports/output/event-publisher.port';
import {
  ARTIFACT_STORAGE_PORT,
  EVENT_PUBLISHER_PORT,
  JOB_RECORD_REPOSITORY_PORT,
  SIGNING_INVOKER_PORT,
  STAGING_STORAGE_PORT,
} from '../ports/tokens';
import { ContentHasherService } from '../../shared/integrity/content-hasher.service';
import { SigningJobEntity } from '../../domain/entities/signing-job.entity';
import { SigningJobCompletedEvent } from '../../domain/events/signing-job-completed.event';
import {
  SigningJobFailedEvent,
  type SigningJobFailedEventPayload,
} from '../../domain/events/signing-job-failed.event';
import { buildOutputName } from '../../domain/value-objects/output-name.vo';
import { outcomeToError } from '../../domain/value-objects/signing-outcome.vo';
import {
  IntegrityComputationError,
  JobStateConflictError,
  errorMessage,
} from '../../domain/errors/signing-service.errors';

type FailureReason = SigningJobFailedEventPayload['failureReason'];

interface FinishedJob {
  job: SigningJobEntity;
  failureReason?: FailureReason;
}

/**
 * Process Signing Job Use Case
 *
 * The background unit of one job. Flow:
 * 1. Load the record
 * 2. Re-hash the staged input and compare with the recorded content hash
 * 3. Run the signer into the artifact storage's output path
 * 4. Persist the terminal state with a single update and publish the event
 *
 * When the store fails mid-unit the record is read again and failed, so it
 * does not stay in `processing`. The staged input is removed in every case.
 */
@Injectable()
export class ProcessSigningJobUseCase implements ProcessSigningJobPort {
  private readonly logger = new Logger(ProcessSigningJobUseCase.name);

  constructor(
    @Inject(JOB_RECORD_REPOSITORY_PORT)
    private readonly jobRepository: JobRecordRepositoryPort,
    private readonly contentHasher: ContentHasherService,
    @Inject(SIGNING_INVOKER_PORT)
    private readonly signingInvoker: SigningInvokerPort,
    @Inject(ARTIFACT_STORAGE_PORT)
    private readonly artifactStorage: ArtifactStoragePort,
    @Inject(STAGING_STORAGE_PORT)
    private readonly stagingStorage: StagingStoragePort,
    @Inject(EVENT_PUBLISHER_PORT)
    private readonly eventPublisher: EventPublisherPort,
  ) {}

  async execute(command: ProcessSigningJobCommand): Promise<ProcessSigningJobResult> {
    const startedAt = Date.now();
    this.logger.debug(`Processing job ${command.jobId}`);

    try {
      const job = await this.loadProcessingJob(command.jobId);
      if (!job) {
        return { job: null };
      }

      const finished = await this.sign(job, command.stagedPath);
      return { job: await this.persist(finished, Date.now() - startedAt) };
    } catch (error) {
      this.logger.error(`Failed to process job ${command.jobId}: ${errorMessage(error)}`);
      return {
        job: await this.failAfterError(
          command.jobId,
          `Processing failed: ${errorMessage(error)}`,
          'unexpected_error',
          Date.now() - startedAt,
        ),
      };
    } finally {
      await this.removeStaged(command);
    }
  }

  async cancel(command: ProcessSigningJobCommand, reason: string): Promise<ProcessSigningJobResult> {
    try {
      const job = await this.loadProcessingJob(command.jobId);
      if (!job) {
        return { job: null };
      }

      this.logger.warn(`Cancelling job ${command.jobId}: ${reason}`);
      return { job: await this.persist({ job: job.fail(reason), failureReason: 'cancelled' }, 0) };
    } catch (error) {
      this.logger.error(`Failed to cancel job ${command.jobId}: ${errorMessage(error)}`);
      return { job: await this.failAfterError(command.jobId, reason, 'cancelled', 0) };
    } finally {
      await this.removeStaged(command);
    }
  }

  private async loadProcessingJob(jobId: string): Promise<SigningJobEntity | null> {
    const job = await this.jobRepository.findById(jobId);
    if (!job) {
      this.logger.warn(`Job ${jobId} not found, skipping`);
      return null;
    }
    if (job.isTerminal()) {
      this.logger.warn(`Job ${jobId} is already ${job.status}, skipping`);
      return null;
    }
    return job;
  }

  private async sign(job: SigningJobEntity, stagedPath: string): Promise<FinishedJob> {
    let outputPath: string | undefined;

    try {
      await this.verifyIntegrity(job, stagedPath);

      const outputName = buildOutputName(job.originalName, job.jobId);
      outputPath = await this.artifactStorage.prepareOutputPath(outputName);

      const outcome = await this.signingInvoker.sign({
        inputPath: stagedPath,
        outputPath,
        jobId: job.jobId,
      });

      if (outcome.kind === 'success') {
        await this.artifactStorage.publish(outputName, outcome.outputPath);
        return { job: job.complete(outputName) };
      }

      await this.discardOutput(outputPath);
      const error = outcomeToError(outcome);
      return { job: job.fail(error.message), failureReason: error.code };
    } catch (error) {
      if (outputPath) {
        await this.discardOutput(outputPath);
      }
      if (error instanceof IntegrityComputationError) {
        return { job: job.fail(error.message), failureReason: error.code };
      }
      return {
        job: job.fail(`Processing failed: ${errorMessage(error)}`),
        failureReason: 'unexpected_error',
      };
    }
  }

  private async verifyIntegrity(job: SigningJobEntity, stagedPath: string): Promise<void> {
    const actual = await this.contentHasher.hashFile(stagedPath);
    if (actual !== job.contentHash) {
      throw new IntegrityComputationError(
        `staged input hashes to ${actual}, expected ${job.contentHash}`,
      );
    }
  }

  private async persist(
    finished: FinishedJob,
    durationMs: number,
  ): Promise<SigningJobEntity | null> {
    const { job, failureReason } = finished;

    let saved: SigningJobEntity;
    try {
      saved = await this.jobRepository.update(job);
    } catch (error) {
      if (error instanceof JobStateConflictError) {
        this.logger.warn(error.message);
        return null;
      }
      throw error;
    }

    if (saved.isCompleted() && saved.outputName) {
      this.logger.log(`Job ${saved.jobId} completed: ${saved.outputName}`);
      await this.eventPublisher.publish(
        new SigningJobCompletedEvent({
          jobId: saved.jobId,
          outputName: saved.outputName,
          durationMs,
        }),
      );
    } else if (saved.errorDetail) {
      this.logger.warn(`Job ${saved.jobId} failed: ${saved.errorDetail}`);
      await this.eventPublisher.publish(
        new SigningJobFailedEvent({
          jobId: saved.jobId,
          errorDetail: saved.errorDetail,
          failureReason: failureReason ?? 'unexpected_error',
        }),
      );
    }

    return saved;
  }

  /**
   * One more attempt at a terminal update after the unit itself threw.
   * Resolves null when the record is gone, already terminal, or the store is
   * still failing; startup recovery picks up what is left.
   */
  private async failAfterError(
    jobId: string,
    errorDetail: string,
    failureReason: FailureReason,
    durationMs: number,
  ): Promise<SigningJobEntity | null> {
    try {
      const job = await this.jobRepository.findById(jobId);
      if (!job || job.isTerminal()) {
        return null;
      }
      return await this.persist({ job: job.fail(errorDetail), failureReason }, durationMs);
    } catch (error) {
      this.logger.error(`Could not record failure of job ${jobId}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async discardOutput(outputPath: string): Promise<void> {
    try {
      await this.artifactStorage.discard(outputPath);
    } catch (error) {
      this.logger.warn(`Failed to discard partial output ${outputPath}: ${errorMessage(error)}`);
    }
  }

  private async removeStaged(command: ProcessSigningJobCommand): Promise<void> {
    try {
      await this.stagingStorage.remove(command.stagedPath);
    } catch (error) {
      this.logger.error(
        `Failed to remove staged input for job ${command.jobId}: ${errorMessage(error)}`,
      );
    }
  }
}
