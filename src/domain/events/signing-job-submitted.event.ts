import { DomainEvent } from './base.event';

/**
 * Emitted once a submission has been accepted and its record created.
 */
export interface SigningJobSubmittedEventPayload {
  jobId: string;
  originalName: string;
  contentHash: string;
  hasDeviceInfo: boolean;
}

export class SigningJobSubmittedEvent extends DomainEvent<SigningJobSubmittedEventPayload> {
  constructor(payload: SigningJobSubmittedEventPayload) {
    super(payload);
  }

  get eventName(): string {
    return 'signing-job.submitted';
  }
}
