import { Inject, Injectable, Logger } from '@nestjs/common';
import type { GetSignedArtifactPort, SignedArtifact } from '../ports/input/get-signed-artifact.port';
import type { JobRecordRepositoryPort } from '../ports/output/job-record-repository.port';
import type { ArtifactStoragePort } from '../ports/output/artifact-storage.port';
import { ARTIFACT_STORAGE_PORT, JOB_RECORD_REPOSITORY_PORT } from '../ports/tokens';
import { SIGNED_OUTPUT_CONTENT_TYPE } from '../../domain/value-objects/output-name.vo';
import {
  ArtifactMissingError,
  ArtifactNotReadyError,
  JobNotFoundError,
} from '../../domain/errors/signing-service.errors';

/**
 * Get Signed Artifact Use Case
 * Only completed jobs have an artifact; failed jobs are reported as not
 * ready, with their status, like jobs still processing.
 */
@Injectable()
export class GetSignedArtifactUseCase implements GetSignedArtifactPort {
  private readonly logger = new Logger(GetSignedArtifactUseCase.name);

  constructor(
    @Inject(JOB_RECORD_REPOSITORY_PORT)
    private readonly jobRepository: JobRecordRepositoryPort,
    @Inject(ARTIFACT_STORAGE_PORT)
    private readonly artifactStorage: ArtifactStoragePort,
  ) {}

  async execute(jobId: string): Promise<SignedArtifact> {
    const job = await this.jobRepository.findById(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }

    if (!job.isCompleted() || !job.outputName) {
      throw new ArtifactNotReadyError(jobId, job.status.toString());
    }

    const artifact = await this.artifactStorage.openReadStream(job.outputName);
    if (!artifact) {
      this.logger.warn(`Artifact ${job.outputName} of completed job ${jobId} is missing`);
      throw new ArtifactMissingError(jobId);
    }

    return {
      stream: artifact.stream,
      fileName: job.outputName,
      contentType: SIGNED_OUTPUT_CONTENT_TYPE,
      contentLength: artifact.contentLength,
    };
  }
}
