import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HealthIndicator, HealthIndicatorResult, HealthCheckError } from '@nestjs/terminus';
import { promises as fs } from 'fs';
import type { AppConfig } from '../../config/configuration';
import { errorMessage } from '../../domain/errors/signing-service.errors';

export interface DiskUsage {
  total: number;
  free: number;
  freePercent: number;
}

/**
 * Free space on the filesystem holding the staging area. Uploads and signed
 * artifacts are both written to local disk before anything else happens.
 */
@Injectable()
export class DiskSpaceHealthIndicator extends HealthIndicator {
  private readonly stagingDir: string;
  private readonly minFreeSpacePercent = 10;

  constructor(private readonly configService: ConfigService<AppConfig, true>) {
    super();
    this.stagingDir = this.configService.get('files', { infer: true }).stagingDir;
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    let diskInfo: DiskUsage;
    try {
      await fs.mkdir(this.stagingDir, { recursive: true });
      diskInfo = await this.getDiskUsage(this.stagingDir);
    } catch (error) {
      throw new HealthCheckError(
        'Disk space check failed',
        this.getStatus(key, false, { error: errorMessage(error) }),
      );
    }

    const details = {
      path: this.stagingDir,
      totalBytes: diskInfo.total,
      freeBytes: diskInfo.free,
      freePercent: Math.round(diskInfo.freePercent * 10) / 10,
    };

    if (diskInfo.freePercent >= this.minFreeSpacePercent) {
      return this.getStatus(key, true, details);
    }

    throw new HealthCheckError(
      `Low disk space: ${diskInfo.freePercent.toFixed(1)}% free`,
      this.getStatus(key, false, details),
    );
  }

  async getDiskUsage(dir: string): Promise<DiskUsage> {
    const stats = await fs.statfs(dir);
    const total = stats.blocks * stats.bsize;
    const free = stats.bavail * stats.bsize;

    return { total, free, freePercent: total > 0 ? (free / total) * 100 : 0 };
  }
}
