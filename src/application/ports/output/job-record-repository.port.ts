import type { SigningJobEntity } from '../../../domain/entities/signing-job.entity';
import type { JobStatus } from '../../../domain/value-objects/job-status.vo';

export interface FindByStatusOptions {
  limit?: number;
  /** `nextCursor` of the previous page */
  cursor?: string;
}

/**
 * One page of a status query. `nextCursor` is absent on the last page.
 */
export interface JobRecordPage {
  jobs: SigningJobEntity[];
  nextCursor?: string;
}

/**
 * Job Record Repository Port (Driven Port)
 * Durable table of signing job records.
 */
export interface JobRecordRepositoryPort {
  /**
   * Persist a new record. Rejects if a record with the same id exists.
   */
  create(job: SigningJobEntity): Promise<void>;

  /**
   * Find a job by its ID
   */
  findById(jobId: string): Promise<SigningJobEntity | null>;

  /**
   * Write the terminal fields of a job in one atomic step.
   *
   * Only succeeds while the stored record is still processing; otherwise
   * rejects with JobStateConflictError. Unknown ids reject with
   * JobNotFoundError. Returns the stored entity.
   */
  update(job: SigningJobEntity): Promise<SigningJobEntity>;

  /**
   * Find jobs by status, one page at a time (startup recovery). Pages follow
   * the store's key order, so records updated while paging are not revisited.
   */
  findByStatus(status: JobStatus, options?: FindByStatusOptions): Promise<JobRecordPage>;
}
