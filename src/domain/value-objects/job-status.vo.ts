/**
 * Job Status Value Object
 * Lifecycle status of a signing job. `PENDING` is the transient state before
 * the record exists and is never persisted.
 */
export enum JobStatus {
  PENDING = 'pending',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export class JobStatusVO {
  private constructor(private readonly _value: JobStatus) {}

  static fromString(value: string): JobStatusVO {
    const normalizedValue = value.toLowerCase();
    const status = Object.values(JobStatus).find((candidate) => candidate === normalizedValue);
    if (!status) {
      throw new Error(`Invalid job status: ${value}`);
    }
    return new JobStatusVO(status);
  }

  static pending(): JobStatusVO {
    return new JobStatusVO(JobStatus.PENDING);
  }

  static processing(): JobStatusVO {
    return new JobStatusVO(JobStatus.PROCESSING);
  }

  static completed(): JobStatusVO {
    return new JobStatusVO(JobStatus.COMPLETED);
  }

  static failed(): JobStatusVO {
    return new JobStatusVO(JobStatus.FAILED);
  }

  get value(): JobStatus {
    return this._value;
  }

  isTerminal(): boolean {
    return this._value === JobStatus.COMPLETED || this._value === JobStatus.FAILED;
  }

  isProcessing(): boolean {
    return this._value === JobStatus.PROCESSING;
  }

  isCompleted(): boolean {
    return this._value === JobStatus.COMPLETED;
  }

  isFailed(): boolean {
    return this._value === JobStatus.FAILED;
  }

  canTransitionTo(newStatus: JobStatusVO): boolean {
    const transitions: Record<JobStatus, JobStatus[]> = {
      [JobStatus.PENDING]: [JobStatus.PROCESSING],
      [JobStatus.PROCESSING]: [JobStatus.COMPLETED, JobStatus.FAILED],
      [JobStatus.COMPLETED]: [],
      [JobStatus.FAILED]: [],
    };

    return transitions[this._value].includes(newStatus._value);
  }

  equals(other: JobStatusVO): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
