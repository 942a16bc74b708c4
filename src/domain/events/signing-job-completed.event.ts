import { DomainEvent } from './base.event';

export interface SigningJobCompletedEventPayload {
  jobId: string;
  outputName: string;
  durationMs: number;
}

export class SigningJobCompletedEvent extends DomainEvent<SigningJobCompletedEventPayload> {
  constructor(payload: SigningJobCompletedEventPayload) {
    super(payload);
  }

  get eventName(): string {
    return 'signing-job.completed';
  }
}
