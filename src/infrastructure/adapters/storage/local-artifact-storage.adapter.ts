import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createReadStream, promises as fs } from 'fs';
import * as path from 'path';
import type { AppConfig } from '../../../config/configuration';
import type {
  ArtifactStoragePort,
  ArtifactStream,
} from '../../../application/ports/output/artifact-storage.port';

/**
 * Local Artifact Storage Adapter
 * Signed artifacts are written to and served from `TEMP_DIR`.
 */
@Injectable()
export class LocalArtifactStorageAdapter implements ArtifactStoragePort {
  private readonly outputDir: string;

  constructor(private readonly configService: ConfigService<AppConfig, true>) {
    this.outputDir = this.configService.get('files', { infer: true }).outputDir;
  }

  async prepareOutputPath(outputName: string): Promise<string> {
    await fs.mkdir(this.outputDir, { recursive: true });
    return this.resolve(outputName);
  }

  async publish(outputName: string, localPath: string): Promise<void> {
    const target = this.resolve(outputName);
    if (path.resolve(localPath) !== target) {
      await fs.rename(localPath, target);
    }
  }

  async discard(localPath: string): Promise<void> {
    await fs.rm(localPath, { force: true });
  }

  async openReadStream(outputName: string): Promise<ArtifactStream | null> {
    const filePath = this.resolve(outputName);

    let size: number;
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) return null;
      size = stats.size;
    } catch {
      return null;
    }

    return { stream: createReadStream(filePath), contentLength: size };
  }

  private resolve(outputName: string): string {
    return path.resolve(this.outputDir, path.basename(outputName));
  }
}
