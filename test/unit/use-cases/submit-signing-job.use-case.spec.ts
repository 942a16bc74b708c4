import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import {
  JobStatus,
  ServiceBusyError,
  StagingError,
  ValidationError,
} from '../../../src/domain';
import { SHUTDOWN_CANCEL_REASON } from '../../../src/application/ports/output/signing-pool.port';
import { createTempDir, fileExists, removeTempDir, sha256 } from '../helpers/mock-factories';
import { createSigningHarness, type SigningHarness } from '../helpers/signing-harness';
import { writesOutput } from '../../in-memory-adapters';

describe('SubmitSigningJobUseCase', () => {
  const content = 'video-bytes';
  let tempDir: string;
  let harness: SigningHarness;
  let uploadPath: string;

  const stagedFiles = async () => fs.readdir(harness.config.files.stagingDir).catch(() => []);

  beforeEach(async () => {
    tempDir = await createTempDir();
    harness = createSigningHarness(tempDir);
    uploadPath = path.join(tempDir, 'upload-0001');
    await fs.writeFile(uploadPath, content);
  });

  afterEach(async () => {
    await harness.signingPool.waitForIdle();
    await removeTempDir(tempDir);
  });

  it('should accept a supported upload and return at once', async () => {
    const result = await harness.submitSigningJob.execute({
      originalName: 'clip.mp4',
      sourcePath: uploadPath,
    });

    expect(result).toEqual({
      jobId: expect.stringMatching(/^[0-9a-f-]{36}$/),
      status: 'processing',
      contentHash: sha256(content),
    });
    expect(await fileExists(uploadPath)).toBe(false);
  });

  it('should record the submission and publish the submitted event', async () => {
    const { jobId } = await harness.submitSigningJob.execute({
      originalName: 'clip.mp4',
      sourcePath: uploadPath,
    });

    const job = await harness.jobRepository.findById(jobId);
    expect(job?.originalName).toBe('clip.mp4');
    expect(job?.contentHash).toBe(sha256(content));
    expect(harness.eventPublisher.eventNames()[0]).toBe('signing-job.submitted');
  });

  it('should hand the job to the signing pool', async () => {
    const { jobId } = await harness.submitSigningJob.execute({
      originalName: 'clip.mp4',
      sourcePath: uploadPath,
    });

    await harness.signingPool.waitForIdle();

    const job = await harness.jobRepository.findById(jobId);
    expect(job?.status.value).toBe(JobStatus.COMPLETED);
    expect(harness.signer.requests[0]?.inputPath).toBe(
      path.join(harness.config.files.stagingDir, `${jobId}.mp4`),
    );
    expect(await stagedFiles()).toEqual([]);
  });

  it('should keep device info that is a JSON object', async () => {
    const { jobId } = await harness.submitSigningJob.execute({
      originalName: 'clip.mp4',
      sourcePath: uploadPath,
      deviceInfo: '{"os":"android","model":"cam-1"}',
    });

    expect((await harness.jobRepository.findById(jobId))?.deviceInfo).toEqual({
      os: 'android',
      model: 'cam-1',
    });
  });

  it('should accept the upload when device info is malformed', async () => {
    const { jobId } = await harness.submitSigningJob.execute({
      originalName: 'clip.mp4',
      sourcePath: uploadPath,
      deviceInfo: '{oops',
    });

    expect((await harness.jobRepository.findById(jobId))?.deviceInfo).toBeUndefined();
  });

  describe('rejections', () => {
    it('should reject an unsupported extension without creating a record', async () => {
      await expect(
        harness.submitSigningJob.execute({ originalName: 'notes.txt', sourcePath: uploadPath }),
      ).rejects.toThrow(
        new ValidationError(
          'Unsupported file format for "notes.txt". Supported: .mp4, .mov, .avi, .mkv, .m4v',
        ),
      );

      expect(harness.jobRepository.size).toBe(0);
      expect(harness.eventPublisher.events).toEqual([]);
      expect(await fileExists(uploadPath)).toBe(false);
    });

    it('should reject when the pool has no capacity', async () => {
      vi.spyOn(harness.signingPool, 'hasCapacity').mockReturnValue(false);

      await expect(
        harness.submitSigningJob.execute({ originalName: 'clip.mp4', sourcePath: uploadPath }),
      ).rejects.toBeInstanceOf(ServiceBusyError);

      expect(harness.jobRepository.size).toBe(0);
      expect(await fileExists(uploadPath)).toBe(false);
    });

    it('should refuse concurrent submissions beyond capacity before creating records', async () => {
      harness = createSigningHarness(tempDir, { SIGNING_CONCURRENCY: '1', MAX_QUEUED_JOBS: '0' });
      let releaseSigner: () => void = () => undefined;
      const signerGate = new Promise<void>((resolve) => {
        releaseSigner = resolve;
      });
      harness.signer.respondWith(async (request) => {
        await signerGate;
        return writesOutput('signed-video')(request);
      });
      const secondUpload = path.join(tempDir, 'upload-0002');
      await fs.writeFile(secondUpload, content);

      const results = await Promise.allSettled([
        harness.submitSigningJob.execute({ originalName: 'a.mp4', sourcePath: uploadPath }),
        harness.submitSigningJob.execute({ originalName: 'b.mp4', sourcePath: secondUpload }),
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
      expect(results[1]).toEqual({ status: 'rejected', reason: new ServiceBusyError() });
      expect(harness.jobRepository.size).toBe(1);
      expect((await harness.jobRepository.findByStatus(JobStatus.FAILED)).jobs).toEqual([]);
      expect(await fileExists(secondUpload)).toBe(false);

      releaseSigner();
      await harness.signingPool.waitForIdle();
      expect(harness.signingPool.getStats()).toMatchObject({ completedTasks: 1, reservedSlots: 0 });
    });

    it('should give the reserved slot back when staging fails', async () => {
      await expect(
        harness.submitSigningJob.execute({
          originalName: 'clip.mp4',
          sourcePath: path.join(tempDir, 'vanished'),
        }),
      ).rejects.toBeInstanceOf(StagingError);

      expect(harness.signingPool.getStats()).toMatchObject({
        reservedSlots: 0,
        isAcceptingTasks: true,
      });
    });

    it('should report a staging failure without creating a record', async () => {
      await expect(
        harness.submitSigningJob.execute({
          originalName: 'clip.mp4',
          sourcePath: path.join(tempDir, 'vanished'),
        }),
      ).rejects.toBeInstanceOf(StagingError);

      expect(harness.jobRepository.size).toBe(0);
    });

    it('should remove the staged bytes when hashing fails', async () => {
      vi.spyOn(harness.contentHasher, 'hashFile').mockRejectedValue(new Error('EIO'));

      await expect(
        harness.submitSigningJob.execute({ originalName: 'clip.mp4', sourcePath: uploadPath }),
      ).rejects.toThrow(new StagingError('Failed to read staged upload: EIO'));

      expect(harness.jobRepository.size).toBe(0);
      expect(await stagedFiles()).toEqual([]);
    });

    it('should remove the staged bytes when the record cannot be created', async () => {
      vi.spyOn(harness.jobRepository, 'create').mockRejectedValue(new Error('table missing'));

      await expect(
        harness.submitSigningJob.execute({ originalName: 'clip.mp4', sourcePath: uploadPath }),
      ).rejects.toThrow('table missing');

      expect(await stagedFiles()).toEqual([]);
    });

    it('should fail the new record when the pool shuts down before scheduling', async () => {
      vi.spyOn(harness.signingPool, 'schedule').mockImplementation(() => {
        throw ServiceBusyError.forShutdown();
      });

      await expect(
        harness.submitSigningJob.execute({ originalName: 'clip.mp4', sourcePath: uploadPath }),
      ).rejects.toThrow('Signing pool is shutting down');

      const {
        jobs: [job],
      } = await harness.jobRepository.findByStatus(JobStatus.FAILED);
      expect(job?.errorDetail).toBe(SHUTDOWN_CANCEL_REASON);
      expect(await stagedFiles()).toEqual([]);
    });

    it('should record the actual refusal when scheduling fails otherwise', async () => {
      vi.spyOn(harness.signingPool, 'schedule').mockImplementation(() => {
        throw new Error('executor unavailable');
      });

      await expect(
        harness.submitSigningJob.execute({ originalName: 'clip.mp4', sourcePath: uploadPath }),
      ).rejects.toThrow(new ServiceBusyError('executor unavailable'));

      const {
        jobs: [job],
      } = await harness.jobRepository.findByStatus(JobStatus.FAILED);
      expect(job?.errorDetail).toBe('Signing cancelled: executor unavailable');
    });
  });
});
