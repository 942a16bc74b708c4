import type { SigningJobEntity } from '../../../domain/entities/signing-job.entity';

/**
 * Process Signing Job Command
 */
export interface ProcessSigningJobCommand {
  jobId: string;
  stagedPath: string;
}

/**
 * Process Signing Job Result
 */
export interface ProcessSigningJobResult {
  /** Terminal record, or null when the job could not be loaded or saved. */
  job: SigningJobEntity | null;
}

/**
 * Process Signing Job Port (Driving Port / Use Case Interface)
 * The background unit of one job: verify, sign, record the outcome.
 * Never rejects; the staged input is removed on every path.
 */
export interface ProcessSigningJobPort {
  execute(command: ProcessSigningJobCommand): Promise<ProcessSigningJobResult>;

  /**
   * Fail a job whose background unit will never run.
   */
  cancel(command: ProcessSigningJobCommand, reason: string): Promise<ProcessSigningJobResult>;
}
