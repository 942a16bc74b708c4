import type { Readable } from 'stream';

export interface SignedArtifact {
  stream: Readable;
  fileName: string;
  contentType: string;
  contentLength?: number;
}

/**
 * Get Signed Artifact Port (Driving Port / Use Case Interface)
 * Opens the artifact of a completed job
 */
export interface GetSignedArtifactPort {
  execute(jobId: string): Promise<SignedArtifact>;
}
