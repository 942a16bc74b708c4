import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { S3ArtifactStorageAdapter } from '../../../src/infrastructure/adapters/storage/s3-artifact-storage.adapter';
import { S3Service } from '../../../src/shared/aws/s3/s3.service';
import {
  createConfigService,
  createSilentLogger,
  createTempDir,
  createTestConfig,
  fileExists,
  removeTempDir,
} from '../helpers/mock-factories';

describe('S3ArtifactStorageAdapter', () => {
  let tempDir: string;
  let s3Service: S3Service;
  let storage: S3ArtifactStorageAdapter;

  beforeEach(async () => {
    tempDir = await createTempDir();
    const configService = createConfigService(
      createTestConfig({
        ARTIFACT_STORE_DRIVER: 's3',
        S3_BUCKET_NAME: 'test-bucket',
        S3_PREFIX: 'signed/',
        TEMP_DIR: tempDir,
      }),
    );
    // Real service, every client call stubbed below
    s3Service = new S3Service(configService, createSilentLogger());
    storage = new S3ArtifactStorageAdapter(s3Service, configService);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(tempDir);
  });

  it('should prefix object keys', () => {
    expect(s3Service.getFullKey('clip_signed.mp4')).toBe('signed/clip_signed.mp4');
    expect(s3Service.getFullKey('signed/clip_signed.mp4')).toBe('signed/clip_signed.mp4');
  });

  it('should upload the signed file and remove the local copy', async () => {
    const uploadFile = vi.spyOn(s3Service, 'uploadFile').mockResolvedValue({
      key: 'signed/clip_signed.mp4',
      etag: '"etag"',
      size: 12,
    });
    const outputPath = await storage.prepareOutputPath('clip_signed.mp4');
    await fs.writeFile(outputPath, 'signed-video');

    await storage.publish('clip_signed.mp4', outputPath);

    expect(outputPath).toBe(path.join(tempDir, 'clip_signed.mp4'));
    expect(uploadFile).toHaveBeenCalledWith('clip_signed.mp4', outputPath, {
      contentType: 'video/mp4',
    });
    expect(await fileExists(outputPath)).toBe(false);
  });

  it('should keep the local copy when the upload fails', async () => {
    vi.spyOn(s3Service, 'uploadFile').mockRejectedValue(new Error('AccessDenied'));
    const outputPath = await storage.prepareOutputPath('clip_signed.mp4');
    await fs.writeFile(outputPath, 'signed-video');

    await expect(storage.publish('clip_signed.mp4', outputPath)).rejects.toThrow('AccessDenied');
    expect(await fileExists(outputPath)).toBe(true);
  });

  it('should stream objects from S3', async () => {
    const body = Readable.from(['signed-video']);
    vi.spyOn(s3Service, 'getObjectStream').mockResolvedValue({ stream: body, size: 12 });

    await expect(storage.openReadStream('clip_signed.mp4')).resolves.toEqual({
      stream: body,
      contentLength: 12,
    });
  });

  it('should return null for missing objects', async () => {
    vi.spyOn(s3Service, 'getObjectStream').mockResolvedValue(null);

    await expect(storage.openReadStream('missing.mp4')).resolves.toBeNull();
  });
});
