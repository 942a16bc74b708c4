import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { AppConfig } from '../../../config/configuration';
import type { StagingStoragePort } from '../../../application/ports/output/staging-storage.port';

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Local Staging Storage Adapter
 * Keeps uploads under `STAGING_DIR` as `<jobId><extension>`.
 */
@Injectable()
export class LocalStagingStorageAdapter implements StagingStoragePort {
  private readonly logger = new Logger(LocalStagingStorageAdapter.name);
  private readonly stagingDir: string;

  constructor(private readonly configService: ConfigService<AppConfig, true>) {
    this.stagingDir = this.configService.get('files', { infer: true }).stagingDir;
  }

  async stage(jobId: string, extension: string, sourcePath: string): Promise<string> {
    await fs.mkdir(this.stagingDir, { recursive: true });
    const stagedPath = path.join(this.stagingDir, `${jobId}${extension}`);

    try {
      await fs.rename(sourcePath, stagedPath);
    } catch (error) {
      if (!hasErrorCode(error, 'EXDEV')) {
        throw error;
      }
      // Upload temp dir is on another filesystem
      await this.copyAcrossDevices(sourcePath, stagedPath);
    }

    this.logger.debug(`Staged upload for job ${jobId} at ${stagedPath}`);
    return stagedPath;
  }

  private async copyAcrossDevices(sourcePath: string, stagedPath: string): Promise<void> {
    try {
      await fs.copyFile(sourcePath, stagedPath);
    } catch (error) {
      await fs.rm(stagedPath, { force: true });
      throw error;
    }
    await fs.rm(sourcePath, { force: true });
  }

  async remove(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }
}
