import { Inject, Injectable } from '@nestjs/common';
import type { GetSigningJobPort } from '../ports/input/get-signing-job.port';
import type { JobRecordRepositoryPort } from '../ports/output/job-record-repository.port';
import { JOB_RECORD_REPOSITORY_PORT } from '../ports/tokens';
import type { SigningJobEntity } from '../../domain/entities/signing-job.entity';
import { JobNotFoundError } from '../../domain/errors/signing-service.errors';

/**
 * Get Signing Job Use Case
 */
@Injectable()
export class GetSigningJobUseCase implements GetSigningJobPort {
  constructor(
    @Inject(JOB_RECORD_REPOSITORY_PORT)
    private readonly jobRepository: JobRecordRepositoryPort,
  ) {}

  async execute(jobId: string): Promise<SigningJobEntity> {
    const job = await this.jobRepository.findById(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }
}
