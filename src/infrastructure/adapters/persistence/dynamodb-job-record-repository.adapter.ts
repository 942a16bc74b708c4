import { Injectable, Logger } from '@nestjs/common';
import type {
  FindByStatusOptions,
  JobRecordPage,
  JobRecordRepositoryPort,
} from '../../../application/ports/output/job-record-repository.port';
import { SigningJobEntity } from '../../../domain/entities/signing-job.entity';
import { JobStatus, JobStatusVO } from '../../../domain/value-objects/job-status.vo';
import {
  JobNotFoundError,
  JobStateConflictError,
} from '../../../domain/errors/signing-service.errors';
import { DynamoDbService, SigningJobItem } from '../../../shared/aws/dynamodb/dynamodb.service';

/**
 * DynamoDB Job Record Repository Adapter
 * Implements JobRecordRepositoryPort on the `signing-jobs` table.
 *
 * Table: partition key `jobId`, GSI `status-index` on `status`, TTL on `ttl`.
 */
@Injectable()
export class DynamoDbJobRecordRepositoryAdapter implements JobRecordRepositoryPort {
  private readonly logger = new Logger(DynamoDbJobRecordRepositoryAdapter.name);

  constructor(private readonly dynamoDb: DynamoDbService) {}

  async create(job: SigningJobEntity): Promise<void> {
    const result = await this.dynamoDb.putJob(this.toItem(job));
    if (result === 'exists') {
      throw new Error(`Job ${job.jobId} already exists`);
    }

    this.logger.log(`Saved job ${job.jobId} to DynamoDB`);
  }

  async findById(jobId: string): Promise<SigningJobEntity | null> {
    const item = await this.dynamoDb.getJob(jobId);
    return item ? this.toDomainEntity(item) : null;
  }

  async update(job: SigningJobEntity): Promise<SigningJobEntity> {
    if (!job.completedAt) {
      throw new Error(`Job ${job.jobId} has no terminal state to store`);
    }

    const item = await this.dynamoDb.updateJobIfStatus(job.jobId, JobStatus.PROCESSING, {
      status: job.status.toString(),
      outputName: job.outputName,
      errorDetail: job.errorDetail,
      completedAt: job.completedAt.toISOString(),
    });

    if (!item) {
      // The condition failed: tell a missing record from a finished one.
      const current = await this.dynamoDb.getJob(job.jobId);
      if (!current) {
        throw new JobNotFoundError(job.jobId);
      }
      throw new JobStateConflictError(job.jobId, current.status);
    }

    this.logger.debug(`Updated job ${job.jobId} to ${item.status}`);
    return this.toDomainEntity(item);
  }

  async findByStatus(status: JobStatus, options: FindByStatusOptions = {}): Promise<JobRecordPage> {
    const page = await this.dynamoDb.getJobsByStatus(status, options);
    return {
      jobs: page.items.map((item) => this.toDomainEntity(item)),
      nextCursor: page.nextCursor,
    };
  }

  private toItem(job: SigningJobEntity): Omit<SigningJobItem, 'ttl'> {
    return {
      jobId: job.jobId,
      originalName: job.originalName,
      contentHash: job.contentHash,
      status: job.status.toString(),
      deviceInfo: job.deviceInfo ? { ...job.deviceInfo } : undefined,
      outputName: job.outputName,
      errorDetail: job.errorDetail,
      createdAt: job.createdAt.toISOString(),
      completedAt: job.completedAt?.toISOString(),
    };
  }

  private toDomainEntity(item: SigningJobItem): SigningJobEntity {
    return SigningJobEntity.restore({
      jobId: item.jobId,
      originalName: item.originalName,
      contentHash: item.contentHash,
      status: JobStatusVO.fromString(item.status),
      deviceInfo: item.deviceInfo,
      outputName: item.outputName,
      errorDetail: item.errorDetail,
      createdAt: new Date(item.createdAt),
      completedAt: item.completedAt ? new Date(item.completedAt) : undefined,
    });
  }
}
