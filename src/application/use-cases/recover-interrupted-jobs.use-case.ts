import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  RecoverInterruptedJobsPort,
  RecoverInterruptedJobsResult,
} from '../ports/input/recover-interrupted-jobs.port';
import type { JobRecordRepositoryPort } from '../ports/output/job-record-repository.port';
import type { EventPublisherPort } from '../ports/output/event-publisher.port';
import { EVENT_PUBLISHER_PORT, JOB_RECORD_REPOSITORY_PORT } from '../ports/tokens';
import { SigningJobFailedEvent } from '../../domain/events/signing-job-failed.event';
import { JobStatus } from '../../domain/value-objects/job-status.vo';
import { JobStateConflictError, errorMessage } from '../../domain/errors/signing-service.errors';

export const INTERRUPTED_DETAIL = 'Signing interrupted: service restarted before the job finished';

const RECOVERY_BATCH_SIZE = 100;

/**
 * Recover Interrupted Jobs Use Case
 *
 * Runs once at boot, before any submission is accepted. Background units do
 * not survive a restart, so every record still in `processing` belongs to a
 * previous run and is failed. Assumes one service instance per job store.
 */
@Injectable()
export class RecoverInterruptedJobsUseCase implements RecoverInterruptedJobsPort {
  private readonly logger = new Logger(RecoverInterruptedJobsUseCase.name);

  constructor(
    @Inject(JOB_RECORD_REPOSITORY_PORT)
    private readonly jobRepository: JobRecordRepositoryPort,
    @Inject(EVENT_PUBLISHER_PORT)
    private readonly eventPublisher: EventPublisherPort,
  ) {}

  async execute(): Promise<RecoverInterruptedJobsResult> {
    const recoveredJobIds: string[] = [];
    let cursor: string | undefined;

    do {
      const page = await this.jobRepository.findByStatus(JobStatus.PROCESSING, {
        limit: RECOVERY_BATCH_SIZE,
        cursor,
      });

      for (const job of page.jobs) {
        try {
          const failed = await this.jobRepository.update(job.fail(INTERRUPTED_DETAIL));
          recoveredJobIds.push(failed.jobId);
          this.eventPublisher.publishAsync(
            new SigningJobFailedEvent({
              jobId: failed.jobId,
              errorDetail: INTERRUPTED_DETAIL,
              failureReason: 'interrupted',
            }),
          );
        } catch (error) {
          if (!(error instanceof JobStateConflictError)) {
            throw error;
          }
          this.logger.debug(`Job ${job.jobId} finished before recovery reached it`);
        }
      }

      cursor = page.nextCursor;
    } while (cursor);

    if (recoveredJobIds.length > 0) {
      this.logger.warn(
        `Failed ${recoveredJobIds.length} job(s) interrupted by a restart: ${recoveredJobIds.join(', ')}`,
      );
    }
    return { recoveredJobIds };
  }
}
