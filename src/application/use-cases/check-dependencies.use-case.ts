import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import type {
  CheckDependenciesPort,
  DependencyReport,
} from '../ports/input/check-dependencies.port';
import type { AppConfig } from '../../config/configuration';

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check Dependencies Use Case
 * Existence of the signing library, the signer and the private key. The
 * overall status stays `healthy`; callers read the individual flags.
 */
@Injectable()
export class CheckDependenciesUseCase implements CheckDependenciesPort {
  constructor(private readonly configService: ConfigService<AppConfig, true>) {}

  async execute(): Promise<DependencyReport> {
    const signer = this.configService.get('signer', { infer: true });

    const [signedVideoLib, signerExecutable, privateKey] = await Promise.all([
      pathExists(signer.libraryPath),
      pathExists(signer.executablePath),
      pathExists(signer.privateKeyPath),
    ]);

    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      dependencies: { signedVideoLib, signerExecutable, privateKey },
    };
  }
}
