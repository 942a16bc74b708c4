export { DomainEvent } from './base.event';
export {
  SigningJobSubmittedEvent,
  type SigningJobSubmittedEventPayload,
} from './signing-job-submitted.event';
export {
  SigningJobCompletedEvent,
  type SigningJobCompletedEventPayload,
} from './signing-job-completed.event';
export { SigningJobFailedEvent, type SigningJobFailedEventPayload } from './signing-job-failed.event';
