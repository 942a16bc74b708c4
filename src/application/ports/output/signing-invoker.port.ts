import type { SigningOutcome } from '../../../domain/value-objects/signing-outcome.vo';

export interface SignRequest {
  inputPath: string;
  outputPath: string;
  /** Used to tag log lines only. */
  jobId?: string;
}

/**
 * Signing Invoker Port (Driven Port)
 * Runs the external signing tool once and classifies the result.
 * Implementations never reject: every failure is an outcome variant.
 */
export interface SigningInvokerPort {
  sign(request: SignRequest): Promise<SigningOutcome>;

  /**
   * Check whether the signing tool starts and exits cleanly.
   */
  checkReady(): Promise<boolean>;
}
