/**
 * Signing Service Errors
 *
 * Every failure the service reports carries a stable `code`. Submission-time
 * errors surface to the caller; signing-phase errors end up in the job's
 * `errorDetail`.
 */

export type SigningServiceErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'STAGING_ERROR'
  | 'SERVICE_BUSY'
  | 'SIGNING_TIMEOUT'
  | 'SIGNING_TOOL_FAILURE'
  | 'SIGNING_INVOCATION_ERROR'
  | 'INTEGRITY_ERROR'
  | 'ARTIFACT_NOT_READY'
  | 'ARTIFACT_MISSING'
  | 'STATE_CONFLICT';

export abstract class SigningServiceError extends Error {
  abstract readonly code: SigningServiceErrorCode;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Extra fields rendered next to the message in HTTP responses. */
  get details(): Record<string, unknown> {
    return {};
  }
}

export class ValidationError extends SigningServiceError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    public readonly acceptedFormats: readonly string[] = [],
  ) {
    super(message);
  }

  static unsupportedFormat(fileName: string, acceptedFormats: readonly string[]): ValidationError {
    return new ValidationError(
      `Unsupported file format for "${fileName}". Supported: ${acceptedFormats.join(', ')}`,
      acceptedFormats,
    );
  }

  get details(): Record<string, unknown> {
    return this.acceptedFormats.length > 0 ? { acceptedFormats: [...this.acceptedFormats] } : {};
  }
}

export class JobNotFoundError extends SigningServiceError {
  readonly code = 'NOT_FOUND';

  constructor(public readonly jobId: string) {
    super(`Job ${jobId} not found`);
  }
}

export class StagingError extends SigningServiceError {
  readonly code = 'STAGING_ERROR';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class ServiceBusyError extends SigningServiceError {
  readonly code = 'SERVICE_BUSY';

  constructor(
    message = 'Signing queue is full, retry later',
    public readonly shuttingDown = false,
  ) {
    super(message);
  }

  static forShutdown(): ServiceBusyError {
    return new ServiceBusyError('Signing pool is shutting down', true);
  }
}

export class SigningTimeoutError extends SigningServiceError {
  readonly code = 'SIGNING_TIMEOUT';

  constructor(public readonly timeoutMs: number) {
    super(
      `Signing timeout: signer did not finish within ${Math.round(timeoutMs / 1000)}s and was terminated`,
    );
  }
}

export class SigningToolFailureError extends SigningServiceError {
  readonly code = 'SIGNING_TOOL_FAILURE';

  constructor(
    message: string,
    public readonly exitCode: number | null,
  ) {
    super(message);
  }

  static fromExitCode(exitCode: number, stderr: string): SigningToolFailureError {
    const lastLine = lastNonEmptyLine(stderr);
    const suffix = lastLine ? `: ${lastLine}` : '';
    return new SigningToolFailureError(`Signing failed with code ${exitCode}${suffix}`, exitCode);
  }

  static fromSignal(signal: string): SigningToolFailureError {
    return new SigningToolFailureError(`Signing failed: signer terminated by ${signal}`, null);
  }

  static missingOutput(): SigningToolFailureError {
    return new SigningToolFailureError(
      'Signing failed: signer exited with code 0 but wrote no output',
      0,
    );
  }
}

export class SigningInvocationError extends SigningServiceError {
  readonly code = 'SIGNING_INVOCATION_ERROR';

  constructor(cause: string) {
    super(`Signing tool could not be started: ${cause}`);
  }
}

export class IntegrityComputationError extends SigningServiceError {
  readonly code = 'INTEGRITY_ERROR';

  constructor(reason: string, cause?: unknown) {
    super(`Integrity check failed: ${reason}`, { cause });
  }
}

export class ArtifactNotReadyError extends SigningServiceError {
  readonly code = 'ARTIFACT_NOT_READY';

  constructor(
    public readonly jobId: string,
    public readonly status: string,
  ) {
    super(`Video not yet signed (job ${jobId} is ${status})`);
  }

  get details(): Record<string, unknown> {
    return { status: this.status };
  }
}

export class ArtifactMissingError extends SigningServiceError {
  readonly code = 'ARTIFACT_MISSING';

  constructor(public readonly jobId: string) {
    super(`Signed video file not found for job ${jobId}`);
  }
}

export class JobStateConflictError extends SigningServiceError {
  readonly code = 'STATE_CONFLICT';

  constructor(jobId: string, status: string) {
    super(`Job ${jobId} is already ${status} and cannot be updated`);
  }
}

function lastNonEmptyLine(text: string): string | undefined {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines[lines.length - 1];
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
