import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { spawn, type ChildProcess } from 'child_process';
import { promises as fs } from 'fs';
import type { AppConfig } from '../../../config/configuration';
import type {
  SignRequest,
  SigningInvokerPort,
} from '../../../application/ports/output/signing-invoker.port';
import type { SigningOutcome } from '../../../domain/value-objects/signing-outcome.vo';
import { errorMessage } from '../../../domain/errors/signing-service.errors';

export const READY_CHECK_TIMEOUT_MS = 10_000;

/** Only the tail of each output stream is kept. */
const MAX_CAPTURED_OUTPUT_BYTES = 64 * 1024;

const REDACTED = '[REDACTED]';

type ProcessResult =
  | {
      kind: 'exited';
      code: number | null;
      signal: NodeJS.Signals | null;
      stdout: string;
      stderr: string;
    }
  | { kind: 'timedOut'; stdout: string; stderr: string }
  | { kind: 'spawnError'; message: string };

/**
 * Bounded capture of a child's output stream.
 */
class OutputTail {
  private chunks: Buffer[] = [];
  private size = 0;

  append(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;

    while (this.size > MAX_CAPTURED_OUTPUT_BYTES && this.chunks.length > 1) {
      const dropped = this.chunks.shift();
      this.size -= dropped ? dropped.length : 0;
    }
  }

  toString(): string {
    const joined = Buffer.concat(this.chunks);
    return joined.subarray(Math.max(0, joined.length - MAX_CAPTURED_OUTPUT_BYTES)).toString('utf8');
  }
}

/**
 * Signer Process Adapter
 * Implements SigningInvokerPort by running the signing executable:
 *
 *   signer --input <in> --output <out> --key <key> [--key-password <p>] [--verbose]
 *
 * The child gets its own process group so a timeout kills the signer and
 * anything it started. The passphrase only ever appears in the argument
 * list handed to the child; logged commands show it redacted.
 */
@Injectable()
export class SignerProcessAdapter implements SigningInvokerPort {
  private readonly logger = new Logger(SignerProcessAdapter.name);
  private readonly signer: AppConfig['signer'];

  constructor(private readonly configService: ConfigService<AppConfig, true>) {
    this.signer = this.configService.get('signer', { infer: true });
  }

  async sign(request: SignRequest): Promise<SigningOutcome> {
    const startedAt = Date.now();
    const jobTag = request.jobId ? ` for job ${request.jobId}` : '';

    this.logger.log(
      `Running signer${jobTag}: ${[
        this.signer.executablePath,
        ...this.buildArgs(request, true),
      ].join(' ')}`,
    );

    const result = await this.run(this.buildArgs(request, false), this.signer.timeoutMs);
    const durationMs = Date.now() - startedAt;

    switch (result.kind) {
      case 'spawnError':
        this.logger.error(`Signer could not be started${jobTag}: ${result.message}`);
        return { kind: 'invocationError', message: result.message, durationMs };

      case 'timedOut':
        this.logger.error(`Signer timed out after ${this.signer.timeoutMs}ms${jobTag}`);
        return {
          kind: 'timeout',
          timeoutMs: this.signer.timeoutMs,
          stdout: result.stdout,
          stderr: result.stderr,
          durationMs,
        };

      case 'exited': {
        if (result.code === 0) {
          if (await this.outputExists(request.outputPath)) {
            this.logger.log(`Signer finished in ${durationMs}ms${jobTag}`);
            return {
              kind: 'success',
              outputPath: request.outputPath,
              stdout: result.stdout,
              stderr: result.stderr,
              durationMs,
            };
          }
          this.logger.error(`Signer exited 0 but wrote no output${jobTag}`);
        } else {
          this.logger.error(
            `Signer failed${jobTag} (code ${result.code}, signal ${result.signal}): ${result.stderr.trim()}`,
          );
        }

        return {
          kind: 'signerFailure',
          exitCode: result.code,
          signal: result.signal,
          missingOutput: result.code === 0,
          stdout: result.stdout,
          stderr: result.stderr,
          durationMs,
        };
      }
    }
  }

  async checkReady(): Promise<boolean> {
    const result = await this.run(['--help'], READY_CHECK_TIMEOUT_MS);

    if (result.kind === 'exited' && result.code === 0) {
      this.logger.log('Signer executable is working correctly');
      return true;
    }

    if (result.kind === 'exited') {
      this.logger.warn(`Signer executable returned code ${result.code}`);
    } else if (result.kind === 'timedOut') {
      this.logger.warn(`Signer executable did not answer --help within ${READY_CHECK_TIMEOUT_MS}ms`);
    } else {
      this.logger.error(`Failed to test signer executable: ${result.message}`);
    }
    return false;
  }

  buildArgs(request: SignRequest, redact: boolean): string[] {
    const args = [
      '--input',
      request.inputPath,
      '--output',
      request.outputPath,
      '--key',
      this.signer.privateKeyPath,
    ];

    if (this.signer.privateKeyPassword) {
      args.push('--key-password', redact ? REDACTED : this.signer.privateKeyPassword);
    }
    if (this.signer.verbose) {
      args.push('--verbose');
    }

    return args;
  }

  private buildEnv(): NodeJS.ProcessEnv {
    if (!this.signer.pluginPath) {
      return process.env;
    }
    return { ...process.env, GST_PLUGIN_PATH: this.signer.pluginPath };
  }

  private run(args: string[], timeoutMs: number): Promise<ProcessResult> {
    return new Promise((resolve) => {
      let child: ChildProcess;
      try {
        child = spawn(this.signer.executablePath, args, {
          env: this.buildEnv(),
          detached: true,
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        resolve({ kind: 'spawnError', message: errorMessage(error) });
        return;
      }

      const stdout = new OutputTail();
      const stderr = new OutputTail();
      child.stdout?.on('data', (chunk: Buffer) => stdout.append(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.append(chunk));

      let settled = false;
      const settle = (result: ProcessResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const timer = setTimeout(() => {
        this.killProcessGroup(child);
        settle({ kind: 'timedOut', stdout: stdout.toString(), stderr: stderr.toString() });
      }, timeoutMs);

      child.once('error', (error) => {
        settle({ kind: 'spawnError', message: error.message });
      });

      child.once('close', (code, signal) => {
        settle({
          kind: 'exited',
          code,
          signal,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
        });
      });
    });
  }

  private killProcessGroup(child: ChildProcess): void {
    if (child.pid === undefined) return;

    try {
      process.kill(-child.pid, 'SIGKILL');
    } catch (error) {
      // ESRCH: the group is already gone
      this.logger.debug(`Could not kill signer process group ${child.pid}: ${errorMessage(error)}`);
      child.kill('SIGKILL');
    }
  }

  private async outputExists(outputPath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(outputPath);
      return stats.isFile();
    } catch {
      return false;
    }
  }
}
