import {
  Inject,
  Injectable,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import type { AppConfig } from '../config/configuration';
import type { SigningInvokerPort } from '../application/ports/output/signing-invoker.port';
import { SIGNING_INVOKER_PORT } from '../application/ports/tokens';
import { RecoverInterruptedJobsUseCase } from '../application/use-cases/recover-interrupted-jobs.use-case';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';

/**
 * Runs once before the HTTP server starts listening:
 * 1. Create the staging and output directories
 * 2. Check the signer with `--help` (logged only, never fatal)
 * 3. Fail jobs left in processing by a previous run
 */
@Injectable()
export class LifecycleService implements OnApplicationBootstrap, OnApplicationShutdown {
  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    @Inject(SIGNING_INVOKER_PORT)
    private readonly signingInvoker: SigningInvokerPort,
    private readonly recoverInterruptedJobs: RecoverInterruptedJobsUseCase,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(LifecycleService.name);
  }

  async onApplicationBootstrap(): Promise<void> {
    const files = this.configService.get('files', { infer: true });
    await fs.mkdir(files.stagingDir, { recursive: true });
    await fs.mkdir(files.outputDir, { recursive: true });

    const signerReady = await this.signingInvoker.checkReady();
    if (!signerReady) {
      this.logger.warn('Signer check failed; jobs will fail until the signer is fixed');
    }

    if (this.configService.get('signingPool', { infer: true }).recoverInterruptedJobs) {
      const { recoveredJobIds } = await this.recoverInterruptedJobs.execute();
      this.logger.info({ recovered: recoveredJobIds.length }, 'Startup recovery finished');
    }
  }

  onApplicationShutdown(signal?: string): void {
    this.logger.info({ signal }, 'Application shut down');
  }
}
