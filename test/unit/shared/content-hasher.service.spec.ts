import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import {
  ContentHasherService,
  digestStream,
} from '../../../src/shared/integrity/content-hasher.service';
import { IntegrityComputationError } from '../../../src/domain/errors/signing-service.errors';
import {
  createConfigService,
  createTempDir,
  createTestConfig,
  removeTempDir,
  sha256,
} from '../helpers/mock-factories';

describe('ContentHasherService', () => {
  let tempDir: string;
  let filePath: string;
  const content = Buffer.alloc(10_000, 'abcdefghij');

  beforeEach(async () => {
    tempDir = await createTempDir();
    filePath = path.join(tempDir, 'input.mp4');
    await fs.writeFile(filePath, content);
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should hash a file to the SHA-256 of its bytes', async () => {
    const hasher = new ContentHasherService(createConfigService());

    await expect(hasher.hashFile(filePath)).resolves.toBe(sha256(content));
  });

  it('should not depend on the chunk size', async () => {
    const small = new ContentHasherService(
      createConfigService(createTestConfig({ HASH_CHUNK_SIZE_BYTES: '1024' })),
    );
    const large = new ContentHasherService(
      createConfigService(createTestConfig({ HASH_CHUNK_SIZE_BYTES: '1048576' })),
    );

    const [smallDigest, largeDigest] = await Promise.all([
      small.hashFile(filePath),
      large.hashFile(filePath),
    ]);

    expect(smallDigest).toBe(largeDigest);
  });

  it('should change when a single byte changes', async () => {
    const hasher = new ContentHasherService(createConfigService());
    const before = await hasher.hashFile(filePath);

    const altered = Buffer.from(content);
    altered[5_000] = altered[5_000] ^ 1;
    await fs.writeFile(filePath, altered);

    expect(await hasher.hashFile(filePath)).not.toBe(before);
  });

  it('should hash an empty file', async () => {
    const emptyPath = path.join(tempDir, 'empty.mp4');
    await fs.writeFile(emptyPath, '');

    await expect(new ContentHasherService(createConfigService()).hashFile(emptyPath)).resolves.toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    );
  });

  it('should wrap read failures in IntegrityComputationError', async () => {
    const hasher = new ContentHasherService(createConfigService());

    await expect(hasher.hashFile(path.join(tempDir, 'missing.mp4'))).rejects.toBeInstanceOf(
      IntegrityComputationError,
    );
  });

  it('should hash streams chunk by chunk', async () => {
    const digest = await digestStream(Readable.from([Buffer.from('video-'), 'bytes']));

    expect(digest).toBe(sha256('video-bytes'));
  });

  it('should propagate stream failures', async () => {
    const failing = new Readable({
      read() {
        this.destroy(new Error('disk went away'));
      },
    });

    await expect(digestStream(failing)).rejects.toThrow('disk went away');
  });
});
