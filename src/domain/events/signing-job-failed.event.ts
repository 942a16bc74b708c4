import { DomainEvent } from './base.event';
import type { SigningServiceErrorCode } from '../errors/signing-service.errors';

/**
 * Emitted when a job reaches `failed`, whatever the path (signing outcome,
 * unexpected error, shutdown cancellation or startup recovery).
 */
export interface SigningJobFailedEventPayload {
  jobId: string;
  errorDetail: string;
  failureReason: SigningServiceErrorCode | 'unexpected_error' | 'cancelled' | 'interrupted';
}

export class SigningJobFailedEvent extends DomainEvent<SigningJobFailedEventPayload> {
  constructor(payload: SigningJobFailedEventPayload) {
    super(payload);
  }

  get eventName(): string {
    return 'signing-job.failed';
  }

  get failureReason(): string {
    return this.payload.failureReason;
  }
}
