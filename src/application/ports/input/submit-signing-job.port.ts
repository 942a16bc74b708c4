/**
 * Submit Signing Job Command
 */
export interface SubmitSigningJobCommand {
  /** Client-supplied filename, used for validation and the output name. */
  originalName: string;
  /** Temp file the upload was written to; staging takes ownership of it. */
  sourcePath: string;
  /** Raw `device_info` form field, expected to be a JSON object. */
  deviceInfo?: string;
}

/**
 * Submit Signing Job Result
 */
export interface SubmitSigningJobResult {
  jobId: string;
  status: 'processing';
  contentHash: string;
}

/**
 * Submit Signing Job Port (Driving Port / Use Case Interface)
 * Validates, stages and records an upload, then hands it to the signing pool
 */
export interface SubmitSigningJobPort {
  execute(command: SubmitSigningJobCommand): Promise<SubmitSigningJobResult>;
}
