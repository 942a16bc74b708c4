import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { text } from 'stream/consumers';
import {
  ArtifactMissingError,
  ArtifactNotReadyError,
  JobNotFoundError,
} from '../../../src/domain';
import { createProcessingJob, createTempDir, removeTempDir } from '../helpers/mock-factories';
import { createSigningHarness, type SigningHarness } from '../helpers/signing-harness';

describe('Query use cases', () => {
  let tempDir: string;
  let harness: SigningHarness;

  beforeEach(async () => {
    tempDir = await createTempDir();
    harness = createSigningHarness(tempDir);
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  describe('GetSigningJobUseCase', () => {
    it('should return the stored job', async () => {
      const job = createProcessingJob();
      await harness.jobRepository.create(job);

      const found = await harness.getSigningJob.execute(job.jobId);

      expect(found.toJSON()).toEqual(job.toJSON());
    });

    it('should reject unknown ids', async () => {
      await expect(harness.getSigningJob.execute('missing')).rejects.toThrow(
        new JobNotFoundError('missing'),
      );
    });
  });

  describe('GetSignedArtifactUseCase', () => {
    it('should stream the artifact of a completed job', async () => {
      const job = createProcessingJob();
      await harness.jobRepository.create(job);
      await harness.jobRepository.update(job.complete('clip_signed.mp4'));
      await fs.mkdir(harness.config.files.outputDir, { recursive: true });
      await fs.writeFile(path.join(harness.config.files.outputDir, 'clip_signed.mp4'), 'signed');

      const artifact = await harness.getSignedArtifact.execute(job.jobId);

      expect(artifact.fileName).toBe('clip_signed.mp4');
      expect(artifact.contentType).toBe('video/mp4');
      expect(artifact.contentLength).toBe(6);
      expect(await text(artifact.stream)).toBe('signed');
    });

    it('should report a job still processing as not ready', async () => {
      const job = createProcessingJob();
      await harness.jobRepository.create(job);

      await expect(harness.getSignedArtifact.execute(job.jobId)).rejects.toMatchObject({
        code: 'ARTIFACT_NOT_READY',
        status: 'processing',
      });
    });

    it('should report a failed job as not ready', async () => {
      const job = createProcessingJob();
      await harness.jobRepository.create(job);
      await harness.jobRepository.update(job.fail('Signing failed with code 1'));

      const error = await harness.getSignedArtifact.execute(job.jobId).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ArtifactNotReadyError);
      expect(error).toMatchObject({ status: 'failed', code: 'ARTIFACT_NOT_READY' });
    });

    it('should report a completed job whose file is gone', async () => {
      const job = createProcessingJob();
      await harness.jobRepository.create(job);
      await harness.jobRepository.update(job.complete('clip_signed.mp4'));

      await expect(harness.getSignedArtifact.execute(job.jobId)).rejects.toBeInstanceOf(
        ArtifactMissingError,
      );
    });

    it('should reject unknown ids', async () => {
      await expect(harness.getSignedArtifact.execute('missing')).rejects.toBeInstanceOf(
        JobNotFoundError,
      );
    });
  });
});
