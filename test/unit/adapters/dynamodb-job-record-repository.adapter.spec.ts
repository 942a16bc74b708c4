import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DynamoDbJobRecordRepositoryAdapter } from '../../../src/infrastructure/adapters/persistence/dynamodb-job-record-repository.adapter';
import {
  DynamoDbService,
  decodePageCursor,
  encodePageCursor,
  type SigningJobItem,
} from '../../../src/shared/aws/dynamodb/dynamodb.service';
import { JobNotFoundError, JobStateConflictError, JobStatus } from '../../../src/domain';
import {
  createConfigService,
  createProcessingJob,
  createSilentLogger,
  sha256,
} from '../helpers/mock-factories';

describe('DynamoDbJobRecordRepositoryAdapter', () => {
  let dynamoDb: DynamoDbService;
  let repository: DynamoDbJobRecordRepositoryAdapter;

  const processingItem: SigningJobItem = {
    jobId: '3f2a9c1e-8b7d-4e6f-9a0b-1c2d3e4f5a6b',
    originalName: 'clip.mp4',
    contentHash: sha256('video-bytes'),
    status: 'processing',
    createdAt: '2025-01-01T00:00:00.000Z',
    ttl: 1738281600,
  };

  beforeEach(() => {
    // Real service, every client call stubbed below
    dynamoDb = new DynamoDbService(createConfigService(), createSilentLogger());
    repository = new DynamoDbJobRecordRepositoryAdapter(dynamoDb);
  });

  it('should put the job as an item with ISO dates', async () => {
    const putJob = vi.spyOn(dynamoDb, 'putJob').mockResolvedValue('created');

    await repository.create(createProcessingJob({ deviceInfo: { os: 'android' } }));

    expect(putJob).toHaveBeenCalledWith({
      jobId: processingItem.jobId,
      originalName: 'clip.mp4',
      contentHash: processingItem.contentHash,
      status: 'processing',
      deviceInfo: { os: 'android' },
      outputName: undefined,
      errorDetail: undefined,
      createdAt: '2025-01-01T00:00:00.000Z',
      completedAt: undefined,
    });
  });

  it('should reject a job whose id is taken', async () => {
    vi.spyOn(dynamoDb, 'putJob').mockResolvedValue('exists');

    await expect(repository.create(createProcessingJob())).rejects.toThrow(
      `Job ${processingItem.jobId} already exists`,
    );
  });

  it('should restore items into entities', async () => {
    vi.spyOn(dynamoDb, 'getJob').mockResolvedValue(processingItem);

    const job = await repository.findById(processingItem.jobId);

    expect(job?.status.value).toBe(JobStatus.PROCESSING);
    expect(job?.createdAt).toEqual(new Date('2025-01-01T00:00:00.000Z'));
  });

  it('should return null for unknown ids', async () => {
    vi.spyOn(dynamoDb, 'getJob').mockResolvedValue(null);

    await expect(repository.findById('missing')).resolves.toBeNull();
  });

  describe('update', () => {
    const completedAt = new Date('2025-01-01T00:05:00.000Z');

    it('should write the terminal fields conditioned on processing', async () => {
      const updateJobIfStatus = vi.spyOn(dynamoDb, 'updateJobIfStatus').mockResolvedValue({
        ...processingItem,
        status: 'completed',
        outputName: 'clip_signed.mp4',
        completedAt: completedAt.toISOString(),
      });

      const saved = await repository.update(
        createProcessingJob().complete('clip_signed.mp4', completedAt),
      );

      expect(updateJobIfStatus).toHaveBeenCalledWith(processingItem.jobId, 'processing', {
        status: 'completed',
        outputName: 'clip_signed.mp4',
        errorDetail: undefined,
        completedAt: '2025-01-01T00:05:00.000Z',
      });
      expect(saved.isCompleted()).toBe(true);
    });

    it('should report a conflict when the record already finished', async () => {
      vi.spyOn(dynamoDb, 'updateJobIfStatus').mockResolvedValue(null);
      vi.spyOn(dynamoDb, 'getJob').mockResolvedValue({
        ...processingItem,
        status: 'failed',
        errorDetail: 'boom',
        completedAt: completedAt.toISOString(),
      });

      await expect(
        repository.update(createProcessingJob().complete('clip_signed.mp4', completedAt)),
      ).rejects.toThrow(new JobStateConflictError(processingItem.jobId, 'failed'));
    });

    it('should report a missing record as not found', async () => {
      vi.spyOn(dynamoDb, 'updateJobIfStatus').mockResolvedValue(null);
      vi.spyOn(dynamoDb, 'getJob').mockResolvedValue(null);

      await expect(
        repository.update(createProcessingJob().fail('boom', completedAt)),
      ).rejects.toBeInstanceOf(JobNotFoundError);
    });

    it('should refuse a job that is not terminal', async () => {
      const updateJobIfStatus = vi.spyOn(dynamoDb, 'updateJobIfStatus');

      await expect(repository.update(createProcessingJob())).rejects.toThrow(
        'has no terminal state to store',
      );
      expect(updateJobIfStatus).not.toHaveBeenCalled();
    });
  });

  it('should query jobs by status', async () => {
    const getJobsByStatus = vi
      .spyOn(dynamoDb, 'getJobsByStatus')
      .mockResolvedValue({ items: [processingItem], nextCursor: 'next-page' });

    const page = await repository.findByStatus(JobStatus.PROCESSING, { limit: 25 });

    expect(getJobsByStatus).toHaveBeenCalledWith('processing', { limit: 25 });
    expect(page.jobs.map((job) => job.jobId)).toEqual([processingItem.jobId]);
    expect(page.nextCursor).toBe('next-page');
  });

  describe('page cursors', () => {
    it('should carry the last evaluated key', () => {
      const cursor = encodePageCursor({ jobId: 'job-1', status: 'processing' });

      expect(decodePageCursor(cursor)).toEqual({ jobId: 'job-1', status: 'processing' });
    });

    it('should reject a cursor that is not a key', () => {
      const cursor = Buffer.from('[1,2]').toString('base64url');

      expect(() => decodePageCursor(cursor)).toThrow();
    });
  });
});
