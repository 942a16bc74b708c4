import type { SigningJobEntity } from '../../../domain/entities/signing-job.entity';

/**
 * Get Signing Job Port (Driving Port / Use Case Interface)
 * Current state of a job; rejects with JobNotFoundError for unknown ids
 */
export interface GetSigningJobPort {
  execute(jobId: string): Promise<SigningJobEntity>;
}
