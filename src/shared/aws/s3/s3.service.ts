import { Injectable, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3Client, GetObjectCommand } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { Readable } from 'stream';
import { createReadStream, promises as fs } from 'fs';
import type { AppConfig } from '../../../config/configuration';
import { PinoLoggerService } from '../../logging/pino-logger.service';

export interface UploadOptions {
  contentType?: string;
  metadata?: Record<string, string>;
}

export interface ObjectStream {
  stream: Readable;
  size?: number;
}

function isNotFound(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'name' in error &&
    (error.name === 'NotFound' || error.name === 'NoSuchKey')
  );
}

@Injectable()
export class S3Service implements OnApplicationShutdown {
  private readonly client: S3Client;
  private readonly bucketName?: string;
  private readonly prefix: string;

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.get('aws', { infer: true });
    const artifactStoreConfig = this.configService.get('artifactStore', { infer: true });

    this.client = new S3Client({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint, forcePathStyle: true }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.bucketName = artifactStoreConfig.bucketName;
    this.prefix = artifactStoreConfig.prefix;

    this.logger.setContext(S3Service.name);
  }

  async uploadFile(
    key: string,
    filePath: string,
    options?: UploadOptions,
  ): Promise<{ key: string; etag: string; size: number }> {
    const fullKey = this.getFullKey(key);
    const stats = await fs.stat(filePath);

    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: this.getBucketName(),
        Key: fullKey,
        Body: createReadStream(filePath),
        ContentType: options?.contentType,
        Metadata: options?.metadata,
      },
      queueSize: 4,
      partSize: 10 * 1024 * 1024, // 10MB parts
      leavePartsOnError: false,
    });

    upload.on('httpUploadProgress', (progress) => {
      this.logger.debug(
        { key: fullKey, loaded: progress.loaded, total: progress.total },
        'Upload progress',
      );
    });

    const result = await upload.done();

    this.logger.info({ key: fullKey, size: stats.size }, 'File uploaded successfully');

    return {
      key: fullKey,
      etag: result.ETag || '',
      size: stats.size,
    };
  }

  /**
   * Open an object for streaming; resolves null when the key does not exist.
   */
  async getObjectStream(key: string): Promise<ObjectStream | null> {
    const fullKey = this.getFullKey(key);

    try {
      const response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.getBucketName(),
          Key: fullKey,
        }),
      );

      if (!(response.Body instanceof Readable)) {
        throw new Error(`Object ${fullKey} has no readable body`);
      }

      return { stream: response.Body, size: response.ContentLength };
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  getFullKey(key: string): string {
    if (key.startsWith(this.prefix)) {
      return key;
    }
    return `${this.prefix}${key}`;
  }

  private getBucketName(): string {
    if (!this.bucketName) {
      throw new Error('S3_BUCKET_NAME is not configured');
    }
    return this.bucketName;
  }

  onApplicationShutdown() {
    this.client.destroy();
  }
}
