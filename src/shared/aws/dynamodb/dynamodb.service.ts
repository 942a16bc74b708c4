import { Injectable, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConditionalCheckFailedException, DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import type { AppConfig } from '../../../config/configuration';
import { PinoLoggerService } from '../../logging/pino-logger.service';

/**
 * Stored shape of a signing job. Dates are ISO strings; `ttl` is epoch
 * seconds for DynamoDB's expiry.
 */
export const signingJobItemSchema = z.object({
  jobId: z.string(),
  originalName: z.string(),
  contentHash: z.string(),
  status: z.string(),
  deviceInfo: z.record(z.unknown()).optional(),
  outputName: z.string().optional(),
  errorDetail: z.string().optional(),
  createdAt: z.string(),
  completedAt: z.string().optional(),
  ttl: z.number().optional(),
});

export type SigningJobItem = z.infer<typeof signingJobItemSchema>;

export type TerminalJobFields = Required<Pick<SigningJobItem, 'status' | 'completedAt'>> &
  Pick<SigningJobItem, 'outputName' | 'errorDetail'>;

export type PutJobResult = 'created' | 'exists';

export interface JobItemPage {
  items: SigningJobItem[];
  nextCursor?: string;
}

/** `status-index` keys are strings: `jobId` and `status`. */
const pageKeySchema = z.record(z.string());

/**
 * Opaque cursor for a query's `LastEvaluatedKey`.
 */
export function encodePageCursor(lastEvaluatedKey: Record<string, unknown>): string {
  return Buffer.from(JSON.stringify(lastEvaluatedKey)).toString('base64url');
}

export function decodePageCursor(cursor: string): Record<string, string> {
  return pageKeySchema.parse(JSON.parse(Buffer.from(cursor, 'base64url').toString('utf8')));
}

@Injectable()
export class DynamoDbService implements OnApplicationShutdown {
  private readonly client: DynamoDBClient;
  private readonly docClient: DynamoDBDocumentClient;
  private readonly tableName: string;
  private readonly ttlSeconds: number;

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.get('aws', { infer: true });
    const jobStoreConfig = this.configService.get('jobStore', { infer: true });

    this.client = new DynamoDBClient({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.docClient = DynamoDBDocumentClient.from(this.client, {
      marshallOptions: {
        removeUndefinedValues: true,
      },
    });

    this.tableName = jobStoreConfig.tableName;
    this.ttlSeconds = jobStoreConfig.recordTtlDays * 24 * 60 * 60;
    this.logger.setContext(DynamoDbService.name);
  }

  async putJob(item: Omit<SigningJobItem, 'ttl'>): Promise<PutJobResult> {
    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            ...item,
            ttl: Math.floor(Date.parse(item.createdAt) / 1000) + this.ttlSeconds,
          },
          ConditionExpression: 'attribute_not_exists(jobId)',
        }),
      );
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        return 'exists';
      }
      throw error;
    }

    this.logger.info({ jobId: item.jobId }, 'Job record created');
    return 'created';
  }

  async getJob(jobId: string): Promise<SigningJobItem | null> {
    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { jobId },
        ConsistentRead: true,
      }),
    );

    return result.Item ? signingJobItemSchema.parse(result.Item) : null;
  }

  /**
   * Write every terminal field in one expression, only while the stored
   * status is still `expectedStatus`. Resolves null when the condition fails.
   */
  async updateJobIfStatus(
    jobId: string,
    expectedStatus: string,
    fields: TerminalJobFields,
  ): Promise<SigningJobItem | null> {
    const setClauses = ['#status = :status', 'completedAt = :completedAt'];
    const expressionAttributeValues: Record<string, unknown> = {
      ':status': fields.status,
      ':completedAt': fields.completedAt,
      ':expectedStatus': expectedStatus,
    };

    if (fields.outputName !== undefined) {
      setClauses.push('outputName = :outputName');
      expressionAttributeValues[':outputName'] = fields.outputName;
    }
    if (fields.errorDetail !== undefined) {
      setClauses.push('errorDetail = :errorDetail');
      expressionAttributeValues[':errorDetail'] = fields.errorDetail;
    }

    try {
      const result = await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { jobId },
          UpdateExpression: `SET ${setClauses.join(', ')}`,
          ConditionExpression: 'attribute_exists(jobId) AND #status = :expectedStatus',
          ExpressionAttributeNames: {
            '#status': 'status',
          },
          ExpressionAttributeValues: expressionAttributeValues,
          ReturnValues: 'ALL_NEW',
        }),
      );

      this.logger.info({ jobId, status: fields.status }, 'Job record updated');
      return signingJobItemSchema.parse(result.Attributes);
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        return null;
      }
      throw error;
    }
  }

  async getJobsByStatus(
    status: string,
    options: { limit?: number; cursor?: string } = {},
  ): Promise<JobItemPage> {
    const result = await this.docClient.send(
      new QueryCommand({
        TableName: this.tableName,
        IndexName: 'status-index',
        KeyConditionExpression: '#status = :status',
        ExpressionAttributeNames: {
          '#status': 'status',
        },
        ExpressionAttributeValues: {
          ':status': status,
        },
        Limit: options.limit ?? 100,
        ...(options.cursor ? { ExclusiveStartKey: decodePageCursor(options.cursor) } : {}),
      }),
    );

    return {
      items: (result.Items ?? []).map((item) => signingJobItemSchema.parse(item)),
      nextCursor: result.LastEvaluatedKey
        ? encodePageCursor(result.LastEvaluatedKey)
        : undefined,
    };
  }

  onApplicationShutdown() {
    this.client.destroy();
  }
}
