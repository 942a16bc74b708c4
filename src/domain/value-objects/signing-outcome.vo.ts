import {
  SigningInvocationError,
  SigningServiceError,
  SigningTimeoutError,
  SigningToolFailureError,
} from '../errors/signing-service.errors';

/**
 * Signing Outcome
 * Result of one signer invocation. Exactly one variant applies and each
 * carries only the fields relevant to it.
 */
export type SigningOutcome =
  | SigningSuccess
  | SignerFailure
  | SigningTimedOut
  | SigningInvocationFailure;

export interface SigningSuccess {
  readonly kind: 'success';
  readonly outputPath: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
}

export interface SignerFailure {
  readonly kind: 'signerFailure';
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  /** Set when the signer exited 0 without producing the output file. */
  readonly missingOutput: boolean;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
}

export interface SigningTimedOut {
  readonly kind: 'timeout';
  readonly timeoutMs: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
}

export interface SigningInvocationFailure {
  readonly kind: 'invocationError';
  readonly message: string;
  readonly durationMs: number;
}

export type SigningOutcomeKind = SigningOutcome['kind'];

/**
 * Map a non-success outcome to the error whose message becomes the job's
 * `errorDetail`.
 */
export function outcomeToError(
  outcome: Exclude<SigningOutcome, SigningSuccess>,
): SigningServiceError {
  switch (outcome.kind) {
    case 'timeout':
      return new SigningTimeoutError(outcome.timeoutMs);
    case 'invocationError':
      return new SigningInvocationError(outcome.message);
    case 'signerFailure':
      if (outcome.missingOutput) {
        return SigningToolFailureError.missingOutput();
      }
      if (outcome.exitCode === null) {
        return SigningToolFailureError.fromSignal(outcome.signal ?? 'unknown signal');
      }
      return SigningToolFailureError.fromExitCode(outcome.exitCode, outcome.stderr);
  }
}
