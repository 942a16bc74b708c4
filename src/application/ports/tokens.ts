// Injection tokens (string symbols for DI)
export const JOB_RECORD_REPOSITORY_PORT = 'JobRecordRepositoryPort';
export const SIGNING_INVOKER_PORT = 'SigningInvokerPort';
export const STAGING_STORAGE_PORT = 'StagingStoragePort';
export const ARTIFACT_STORAGE_PORT = 'ArtifactStoragePort';
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
export const SIGNING_POOL_PORT = 'SigningPoolPort';
