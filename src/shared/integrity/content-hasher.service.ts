import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { Readable } from 'stream';
import type { AppConfig } from '../../config/configuration';
import { IntegrityComputationError, errorMessage } from '../../domain/errors/signing-service.errors';

export const CONTENT_HASH_ALGORITHM = 'sha256';

/**
 * Fold every chunk of a stream into a running SHA-256 state and return the hex
 * digest. Only the chunk in flight is held in memory.
 */
export async function digestStream(source: Readable): Promise<string> {
  const hash = createHash(CONTENT_HASH_ALGORITHM);

  for await (const chunk of source) {
    hash.update(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }

  return hash.digest('hex');
}

/**
 * Content Hasher
 * Integrity digest of staged uploads, read in `HASH_CHUNK_SIZE_BYTES` chunks.
 */
@Injectable()
export class ContentHasherService {
  private readonly chunkSize: number;

  constructor(private readonly configService: ConfigService<AppConfig, true>) {
    this.chunkSize = this.configService.get('files', { infer: true }).hashChunkSizeBytes;
  }

  async hashFile(filePath: string): Promise<string> {
    try {
      return await digestStream(createReadStream(filePath, { highWaterMark: this.chunkSize }));
    } catch (error) {
      throw new IntegrityComputationError(`could not read ${filePath}: ${errorMessage(error)}`, error);
    }
  }
}
