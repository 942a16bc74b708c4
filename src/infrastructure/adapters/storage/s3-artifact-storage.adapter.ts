import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { AppConfig } from '../../../config/configuration';
import type {
  ArtifactStoragePort,
  ArtifactStream,
} from '../../../application/ports/output/artifact-storage.port';
import { S3Service } from '../../../shared/aws/s3/s3.service';
import { SIGNED_OUTPUT_CONTENT_TYPE } from '../../../domain/value-objects/output-name.vo';

/**
 * S3 Artifact Storage Adapter
 * The signer still writes to local disk; `publish` uploads the file under
 * `S3_PREFIX` and removes the local copy. Downloads stream from S3.
 */
@Injectable()
export class S3ArtifactStorageAdapter implements ArtifactStoragePort {
  private readonly logger = new Logger(S3ArtifactStorageAdapter.name);
  private readonly outputDir: string;

  constructor(
    private readonly s3Service: S3Service,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {
    this.outputDir = this.configService.get('files', { infer: true }).outputDir;
  }

  async prepareOutputPath(outputName: string): Promise<string> {
    await fs.mkdir(this.outputDir, { recursive: true });
    return path.resolve(this.outputDir, path.basename(outputName));
  }

  async publish(outputName: string, localPath: string): Promise<void> {
    const { key, size } = await this.s3Service.uploadFile(outputName, localPath, {
      contentType: SIGNED_OUTPUT_CONTENT_TYPE,
    });
    await fs.rm(localPath, { force: true });

    this.logger.log(`Published ${outputName} to ${key} (${size} bytes)`);
  }

  async discard(localPath: string): Promise<void> {
    await fs.rm(localPath, { force: true });
  }

  async openReadStream(outputName: string): Promise<ArtifactStream | null> {
    const object = await this.s3Service.getObjectStream(outputName);
    if (!object) {
      return null;
    }
    return { stream: object.stream, contentLength: object.size };
  }
}
