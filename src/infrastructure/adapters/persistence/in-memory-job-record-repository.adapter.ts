import { Injectable } from '@nestjs/common';
import type {
  FindByStatusOptions,
  JobRecordPage,
  JobRecordRepositoryPort,
} from '../../../application/ports/output/job-record-repository.port';
import {
  SigningJobEntity,
  type SigningJobEntityData,
} from '../../../domain/entities/signing-job.entity';
import type { JobStatus } from '../../../domain/value-objects/job-status.vo';
import {
  JobNotFoundError,
  JobStateConflictError,
} from '../../../domain/errors/signing-service.errors';
import { Mutex } from '../../../shared/concurrency/mutex';

/**
 * In-Memory Job Record Repository Adapter
 * Default store for a single service instance. Records live as long as the
 * process.
 *
 * Writes are serialised by a mutex; readers always get a fresh entity built
 * from the stored snapshot.
 */
@Injectable()
export class InMemoryJobRecordRepositoryAdapter implements JobRecordRepositoryPort {
  private readonly records = new Map<string, SigningJobEntityData>();
  private readonly mutex = new Mutex();

  async create(job: SigningJobEntity): Promise<void> {
    await this.mutex.runExclusive(() => {
      if (this.records.has(job.jobId)) {
        throw new Error(`Job ${job.jobId} already exists`);
      }
      this.records.set(job.jobId, snapshot(job));
    });
  }

  async findById(jobId: string): Promise<SigningJobEntity | null> {
    const record = this.records.get(jobId);
    return record ? SigningJobEntity.restore(record) : null;
  }

  async update(job: SigningJobEntity): Promise<SigningJobEntity> {
    return this.mutex.runExclusive(() => {
      const current = this.records.get(job.jobId);
      if (!current) {
        throw new JobNotFoundError(job.jobId);
      }
      if (!current.status.isProcessing()) {
        throw new JobStateConflictError(job.jobId, current.status.toString());
      }

      const updated: SigningJobEntityData = {
        ...current,
        status: job.status,
        outputName: job.outputName,
        errorDetail: job.errorDetail,
        completedAt: job.completedAt,
      };
      const entity = SigningJobEntity.restore(updated);
      this.records.set(job.jobId, snapshot(entity));
      return entity;
    });
  }

  /**
   * Pages in insertion order; the cursor is the id of the last job returned.
   */
  async findByStatus(status: JobStatus, options: FindByStatusOptions = {}): Promise<JobRecordPage> {
    const limit = options.limit ?? 100;
    const jobs: SigningJobEntity[] = [];
    let skipping = options.cursor !== undefined;
    let lastJobId: string | undefined;

    for (const record of this.records.values()) {
      if (skipping) {
        skipping = record.jobId !== options.cursor;
        continue;
      }
      if (record.status.value !== status) continue;
      if (jobs.length === limit) {
        return { jobs, nextCursor: lastJobId };
      }
      jobs.push(SigningJobEntity.restore(record));
      lastJobId = record.jobId;
    }
    return { jobs };
  }

  get size(): number {
    return this.records.size;
  }
}

function snapshot(job: SigningJobEntityData): SigningJobEntityData {
  return {
    jobId: job.jobId,
    originalName: job.originalName,
    contentHash: job.contentHash,
    status: job.status,
    deviceInfo: job.deviceInfo ? structuredClone(job.deviceInfo) : undefined,
    outputName: job.outputName,
    errorDetail: job.errorDetail,
    createdAt: new Date(job.createdAt.getTime()),
    completedAt: job.completedAt ? new Date(job.completedAt.getTime()) : undefined,
  };
}
