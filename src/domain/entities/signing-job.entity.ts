import { produce } from 'immer';
import { JobStatusVO } from '../value-objects/job-status.vo';
import type { DeviceInfo } from '../value-objects/device-info.vo';

/**
 * Signing Job Entity - Aggregate Root
 * One submitted video's end-to-end signing attempt.
 *
 * Same shape as the other entities in this codebase:
 * - Data stored in a plain readonly interface
 * - Domain operations are pure namespace functions
 * - `create` returns the data with the operations attached
 *
 * Invariants enforced here:
 * - `outputName` is present iff the status is completed
 * - `errorDetail` is present iff the status is failed
 * - `completedAt` is present iff the status is terminal
 * - terminal jobs never transition again
 */

/**
 * Core data structure for SigningJobEntity
 */
export interface SigningJobEntityData {
  readonly jobId: string;
  readonly originalName: string;
  readonly contentHash: string;
  readonly status: JobStatusVO;
  readonly deviceInfo?: DeviceInfo;
  readonly outputName?: string;
  readonly errorDetail?: string;
  readonly createdAt: Date;
  readonly completedAt?: Date;
}

export interface SigningJobEntity extends SigningJobEntityData {
  isTerminal(): boolean;
  isCompleted(): boolean;
  isFailed(): boolean;

  complete(outputName: string, completedAt?: Date): SigningJobEntity;
  fail(errorDetail: string, completedAt?: Date): SigningJobEntity;

  toJSON(): ReturnType<typeof SigningJobEntity.toJSON>;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace SigningJobEntity {
  const SHA256_HEX = /^[0-9a-f]{64}$/;

  export interface CreateProps {
    jobId: string;
    originalName: string;
    contentHash: string;
    deviceInfo?: DeviceInfo;
    createdAt?: Date;
  }

  /**
   * Full state, used when loading a stored record.
   */
  export interface RestoreProps extends CreateProps {
    status: JobStatusVO;
    outputName?: string;
    errorDetail?: string;
    completedAt?: Date;
  }

  /**
   * Create a new job in `processing`: the record only exists once the
   * submission has been validated and its bytes staged.
   */
  export function create(props: CreateProps): SigningJobEntity {
    return restore({ ...props, status: JobStatusVO.processing() });
  }

  export function restore(props: RestoreProps): SigningJobEntity {
    validate(props);

    const data: SigningJobEntityData = {
      jobId: props.jobId,
      originalName: props.originalName,
      contentHash: props.contentHash,
      status: props.status,
      deviceInfo: props.deviceInfo,
      outputName: props.outputName,
      errorDetail: props.errorDetail,
      createdAt: props.createdAt ?? new Date(),
      completedAt: props.completedAt,
    };

    return attachMethods(data);
  }

  function attachMethods(data: SigningJobEntityData): SigningJobEntity {
    return {
      ...data,

      isTerminal: () => data.status.isTerminal(),
      isCompleted: () => data.status.isCompleted(),
      isFailed: () => data.status.isFailed(),

      complete: (outputName: string, completedAt?: Date) =>
        complete(data, outputName, completedAt),
      fail: (errorDetail: string, completedAt?: Date) => fail(data, errorDetail, completedAt),

      toJSON: () => toJSON(data),
    };
  }

  function validate(props: RestoreProps): void {
    if (!props.jobId || props.jobId.trim().length === 0) {
      throw new Error('Job ID is required');
    }
    if (!props.originalName || props.originalName.trim().length === 0) {
      throw new Error('Original name is required');
    }
    if (!SHA256_HEX.test(props.contentHash)) {
      throw new Error('Content hash must be a lowercase SHA-256 hex digest');
    }
    if (props.status.value === JobStatusVO.pending().value) {
      throw new Error('Pending jobs are not persisted');
    }

    const completed = props.status.isCompleted();
    const failed = props.status.isFailed();

    if (completed !== Boolean(props.outputName)) {
      throw new Error('Output name must be set exactly when the job is completed');
    }
    if (failed !== Boolean(props.errorDetail)) {
      throw new Error('Error detail must be set exactly when the job has failed');
    }
    if (props.status.isTerminal() !== Boolean(props.completedAt)) {
      throw new Error('Completion time must be set exactly when the job is terminal');
    }
  }

  // ===== State Transitions (Return new instances via Immer) =====

  export function complete(
    job: SigningJobEntityData,
    outputName: string,
    completedAt: Date = new Date(),
  ): SigningJobEntity {
    assertTransition(job, JobStatusVO.completed());
    if (outputName.trim().length === 0) {
      throw new Error('Output name is required to complete a job');
    }

    const updated = produce(job, (draft) => {
      draft.status = JobStatusVO.completed();
      draft.outputName = outputName;
      draft.completedAt = completedAt;
    });
    return attachMethods(updated);
  }

  export function fail(
    job: SigningJobEntityData,
    errorDetail: string,
    completedAt: Date = new Date(),
  ): SigningJobEntity {
    assertTransition(job, JobStatusVO.failed());

    const updated = produce(job, (draft) => {
      draft.status = JobStatusVO.failed();
      draft.errorDetail = errorDetail.trim().length > 0 ? errorDetail : 'Unknown error';
      draft.completedAt = completedAt;
    });
    return attachMethods(updated);
  }

  function assertTransition(job: SigningJobEntityData, next: JobStatusVO): void {
    if (!job.status.canTransitionTo(next)) {
      throw new Error(`Invalid status transition from ${job.status} to ${next}`);
    }
  }

  // ===== Serialization =====

  export function toJSON(job: SigningJobEntityData) {
    return {
      jobId: job.jobId,
      originalName: job.originalName,
      contentHash: job.contentHash,
      status: job.status.toString(),
      deviceInfo: job.deviceInfo,
      outputName: job.outputName,
      errorDetail: job.errorDetail,
      createdAt: job.createdAt.toISOString(),
      completedAt: job.completedAt ? job.completedAt.toISOString() : null,
    };
  }
}
