import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { text } from 'stream/consumers';
import { SHUTDOWN_CANCEL_REASON } from '../../../src/application/ports/output/signing-pool.port';
import { SignerProcessAdapter } from '../../../src/infrastructure/adapters/signing/signer-process.adapter';
import { ArtifactNotReadyError } from '../../../src/domain';
import {
  createConfigService,
  createTempDir,
  createTestConfig,
  removeTempDir,
  sha256,
} from '../helpers/mock-factories';
import { createSigningHarness, type SigningHarness } from '../helpers/signing-harness';
import { returnsOutcome, writesOutput } from '../../in-memory-adapters';

/**
 * Submission to download through the use cases, with local storage on disk.
 */
describe('Signing flow', () => {
  const video = Buffer.alloc(100, 7);
  let tempDir: string;
  let harness: SigningHarness;

  const upload = async (name: string) => {
    const uploadPath = path.join(tempDir, `upload-${name}`);
    await fs.writeFile(uploadPath, video);
    return harness.submitSigningJob.execute({ originalName: name, sourcePath: uploadPath });
  };

  beforeEach(async () => {
    tempDir = await createTempDir();
    harness = createSigningHarness(tempDir, { SIGNING_CONCURRENCY: '1', MAX_QUEUED_JOBS: '1' });
  });

  afterEach(async () => {
    await harness.signingPool.shutdown();
    await removeTempDir(tempDir);
  });

  it('should take an upload through to a downloadable signed video', async () => {
    const accepted = await upload('clip.mp4');
    expect(accepted.contentHash).toBe(sha256(video));

    await harness.signingPool.waitForIdle();

    const job = await harness.getSigningJob.execute(accepted.jobId);
    expect(job.status.toString()).toBe('completed');
    expect(job.outputName).toMatch(
      new RegExp(`^clip_signed_\\d{8}_\\d{6}_${accepted.jobId.slice(0, 8)}\\.mp4$`),
    );

    const artifact = await harness.getSignedArtifact.execute(accepted.jobId);
    expect(artifact.fileName).toBe(job.outputName);
    expect(await text(artifact.stream)).toBe('signed-video');
    expect(await fs.readdir(harness.config.files.stagingDir)).toEqual([]);
    expect(harness.eventPublisher.eventNames()).toEqual([
      'signing-job.submitted',
      'signing-job.completed',
    ]);
  });

  it('should report a signer failure on the job and refuse the download', async () => {
    harness.signer.respondWith(
      returnsOutcome({
        kind: 'signerFailure',
        exitCode: 1,
        signal: null,
        missingOutput: false,
        stdout: '',
        stderr: 'unsupported codec\n',
        durationMs: 3,
      }),
    );

    const accepted = await upload('clip.mov');
    await harness.signingPool.waitForIdle();

    const job = await harness.getSigningJob.execute(accepted.jobId);
    expect(job.errorDetail).toBe('Signing failed with code 1: unsupported codec');
    await expect(harness.getSignedArtifact.execute(accepted.jobId)).rejects.toBeInstanceOf(
      ArtifactNotReadyError,
    );
  });

  it('should fail the job when the signer sleeps past the timeout', async () => {
    const scriptPath = path.join(tempDir, 'slow-signer.sh');
    await fs.writeFile(scriptPath, '#!/bin/sh\nsleep 5\n', { mode: 0o755 });
    const slowSigner = new SignerProcessAdapter(
      createConfigService(
        createTestConfig({ SIGNER_EXECUTABLE: scriptPath, SIGNING_TIMEOUT_MS: '1000' }),
      ),
    );
    harness.signer.respondWith((request) => slowSigner.sign(request));

    const accepted = await upload('clip.mp4');
    await harness.signingPool.waitForIdle();

    const job = await harness.getSigningJob.execute(accepted.jobId);
    expect(job.status.toString()).toBe('failed');
    expect(job.errorDetail).toBe(
      'Signing timeout: signer did not finish within 1s and was terminated',
    );
    expect(await fs.readdir(harness.config.files.outputDir)).toEqual([]);
  });

  it('should fail queued jobs when the service shuts down', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    harness.signer.respondWith(async (request) => {
      await gate;
      return writesOutput('signed-video')(request);
    });

    const running = await upload('first.mp4');
    const queued = await upload('second.mp4');
    await expect(upload('third.mp4')).rejects.toThrow('Signing queue is full, retry later');

    const shutdown = harness.signingPool.shutdown();
    release();
    await shutdown;

    expect((await harness.getSigningJob.execute(running.jobId)).status.toString()).toBe(
      'completed',
    );
    expect((await harness.getSigningJob.execute(queued.jobId)).errorDetail).toBe(
      SHUTDOWN_CANCEL_REASON,
    );
    expect(harness.jobRepository.size).toBe(2);
    expect(await fs.readdir(harness.config.files.stagingDir)).toEqual([]);
  });
});
