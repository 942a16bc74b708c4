/**
 * Domain Layer Barrel Export
 *
 * The domain layer is the core of the application and depends on nothing
 * outside it apart from immer and uuid.
 */

// Entities
export { SigningJobEntity, type SigningJobEntityData } from './entities/signing-job.entity';

// Value Objects
export { JobStatusVO, JobStatus } from './value-objects/job-status.vo';
export {
  outcomeToError,
  type SigningOutcome,
  type SigningOutcomeKind,
  type SigningSuccess,
  type SignerFailure,
  type SigningTimedOut,
  type SigningInvocationFailure,
} from './value-objects/signing-outcome.vo';
export {
  parseDeviceInfo,
  type DeviceInfo,
  type DeviceInfoParseResult,
} from './value-objects/device-info.vo';
export {
  buildOutputName,
  safeBaseName,
  SIGNED_OUTPUT_CONTENT_TYPE,
  SIGNED_OUTPUT_EXTENSION,
} from './value-objects/output-name.vo';

// Errors
export * from './errors/signing-service.errors';

// Events
export * from './events';
