import { z } from 'zod';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const envSchema = z
  .object({
    // Core
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),

    // Signing tool
    SIGNED_VIDEO_LIB_PATH: z.string().default('/usr/local/lib/libsigned-video-framework.so'),
    SIGNER_EXECUTABLE: z.string().default('/usr/local/bin/signer'),
    PRIVATE_KEY_PATH: z.string().default('/etc/video-signing/private.pem'),
    PRIVATE_KEY_PASSWORD: z.string().optional(),
    SIGNER_PLUGIN_PATH: z
      .string()
      .default('/usr/lib/x86_64-linux-gnu/gstreamer-1.0:/usr/local/lib/gstreamer-1.0'),
    SIGNER_VERBOSE: booleanFromEnv.default('true'),
    SIGNING_TIMEOUT_MS: z.coerce.number().int().min(1000).default(300000),

    // Files
    STAGING_DIR: z.string().default('/tmp/video-signing/staging'),
    TEMP_DIR: z.string().default('/tmp/video-signing'),
    SUPPORTED_FORMATS: z.string().default('.mp4,.mov,.avi,.mkv,.m4v'),
    MAX_UPLOAD_SIZE_MB: z.coerce.number().min(1).default(2048),
    HASH_CHUNK_SIZE_BYTES: z.coerce.number().int().min(1024).default(64 * 1024),

    // Signing pool
    SIGNING_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(2),
    MAX_QUEUED_JOBS: z.coerce.number().int().min(0).default(50),
    RECOVER_INTERRUPTED_JOBS: booleanFromEnv.default('true'),

    // Job record store
    JOB_STORE_DRIVER: z.enum(['memory', 'dynamodb']).default('memory'),
    DYNAMODB_TABLE_NAME: z.string().default('signing-jobs'),
    RECORD_TTL_DAYS: z.coerce.number().int().min(1).default(30),

    // Artifact store
    ARTIFACT_STORE_DRIVER: z.enum(['local', 's3']).default('local'),
    S3_BUCKET_NAME: z.string().optional(),
    S3_PREFIX: z.string().default('signed-videos/'),

    // AWS
    AWS_REGION: z.string().default('us-east-1'),
    AWS_ACCESS_KEY_ID: z.string().optional(),
    AWS_SECRET_ACCESS_KEY: z.string().optional(),
    AWS_ENDPOINT: z.string().url().optional(), // For LocalStack
  })
  .superRefine((env, ctx) => {
    if (env.ARTIFACT_STORE_DRIVER === 's3' && !env.S3_BUCKET_NAME) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['S3_BUCKET_NAME'],
        message: 'Required when ARTIFACT_STORE_DRIVER is s3',
      });
    }
  });

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
