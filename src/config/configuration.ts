/**
 * Application Configuration
 *
 * Loads and validates environment variables once at startup and exposes them as
 * a typed `AppConfig` through `ConfigService<AppConfig>`.
 *
 * ## Configuration Sources:
 * 1. Environment variables (`.env` file or system environment)
 * 2. Validated by the Zod schema in `validation.schema.ts`
 * 3. Transformed into the typed AppConfig object below
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig, true>) {}
 *
 * const timeoutMs = this.configService.get('signer', { infer: true }).timeoutMs;
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

export type JobStoreDriver = 'memory' | 'dynamodb';
export type ArtifactStoreDriver = 'local' | 's3';

export interface AppConfig {
  nodeEnv: string;
  port: number;
  logLevel: string;
  /**
   * External signing tool and key material.
   *
   * `libraryPath` is only checked for presence by the health report; the
   * signer executable links against it.
   */
  signer: {
    libraryPath: string;
    executablePath: string;
    privateKeyPath: string;
    privateKeyPassword?: string;
    pluginPath?: string;
    verbose: boolean;
    timeoutMs: number;
  };
  files: {
    /** Uploaded bytes wait here until their background unit finishes. */
    stagingDir: string;
    /** Signed artifacts are written here (and served from here with the local store). */
    outputDir: string;
    supportedFormats: string[];
    maxUploadSizeMb: number;
    hashChunkSizeBytes: number;
  };
  /**
   * Signing pool configuration.
   *
   * ### concurrency (Environment: SIGNING_CONCURRENCY)
   * - Number of signer processes allowed to run at the same time
   * - Each invocation is a separate OS process with its own CPU and memory cost
   * - **Recommended**: number of vCPUs available to the container
   *
   * ### maxQueuedJobs (Environment: MAX_QUEUED_JOBS)
   * - Jobs waiting for a free slot; submissions beyond this are refused with 503
   *   before any record is created
   */
  signingPool: {
    concurrency: number;
    maxQueuedJobs: number;
    recoverInterruptedJobs: boolean;
  };
  jobStore: {
    driver: JobStoreDriver;
    tableName: string;
    recordTtlDays: number;
  };
  artifactStore: {
    driver: ArtifactStoreDriver;
    bucketName?: string;
    prefix: string;
  };
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
}

/**
 * Normalise a comma separated extension list to lower-case entries with a
 * leading dot (`MP4, .mov` -> `['.mp4', '.mov']`).
 */
export function parseSupportedFormats(raw: string): string[] {
  const formats = raw
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0)
    .map((entry) => (entry.startsWith('.') ? entry : `.${entry}`));

  return Array.from(new Set(formats));
}

export function buildConfig(env: EnvConfig): AppConfig {
  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    signer: {
      libraryPath: env.SIGNED_VIDEO_LIB_PATH,
      executablePath: env.SIGNER_EXECUTABLE,
      privateKeyPath: env.PRIVATE_KEY_PATH,
      privateKeyPassword: env.PRIVATE_KEY_PASSWORD || undefined,
      pluginPath: env.SIGNER_PLUGIN_PATH || undefined,
      verbose: env.SIGNER_VERBOSE,
      timeoutMs: env.SIGNING_TIMEOUT_MS,
    },
    files: {
      stagingDir: env.STAGING_DIR,
      outputDir: env.TEMP_DIR,
      supportedFormats: parseSupportedFormats(env.SUPPORTED_FORMATS),
      maxUploadSizeMb: env.MAX_UPLOAD_SIZE_MB,
      hashChunkSizeBytes: env.HASH_CHUNK_SIZE_BYTES,
    },
    signingPool: {
      concurrency: env.SIGNING_CONCURRENCY,
      maxQueuedJobs: env.MAX_QUEUED_JOBS,
      recoverInterruptedJobs: env.RECOVER_INTERRUPTED_JOBS,
    },
    jobStore: {
      driver: env.JOB_STORE_DRIVER,
      tableName: env.DYNAMODB_TABLE_NAME,
      recordTtlDays: env.RECORD_TTL_DAYS,
    },
    artifactStore: {
      driver: env.ARTIFACT_STORE_DRIVER,
      bucketName: env.S3_BUCKET_NAME,
      prefix: env.S3_PREFIX,
    },
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
}

export default (): AppConfig => buildConfig(validateEnv(process.env));
