import type { SigningJobEntity } from '../../domain/entities/signing-job.entity';
import type { SubmitSigningJobResult } from '../../application/ports/input/submit-signing-job.port';

export interface UploadVideoResponseDto extends SubmitSigningJobResult {
  message: string;
}

export interface SigningJobStatusResponseDto {
  jobId: string;
  originalName: string;
  contentHash: string;
  status: string;
  createdAt: string;
  completedAt: string | null;
  outputName?: string;
  errorDetail?: string;
}

export function toUploadVideoResponse(result: SubmitSigningJobResult): UploadVideoResponseDto {
  return {
    message: 'Video uploaded successfully, signing in progress',
    ...result,
  };
}

export function toSigningJobStatusResponse(job: SigningJobEntity): SigningJobStatusResponseDto {
  const json = job.toJSON();
  return {
    jobId: json.jobId,
    originalName: json.originalName,
    contentHash: json.contentHash,
    status: json.status,
    createdAt: json.createdAt,
    completedAt: json.completedAt,
    outputName: json.outputName,
    errorDetail: json.errorDetail,
  };
}
