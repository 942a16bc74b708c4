import { Inject, Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult, HealthCheckError } from '@nestjs/terminus';
import type { SigningPoolPort } from '../../application/ports/output/signing-pool.port';
import { SIGNING_POOL_PORT } from '../../application/ports/tokens';

@Injectable()
export class SigningPoolHealthIndicator extends HealthIndicator {
  constructor(@Inject(SIGNING_POOL_PORT) private readonly signingPool: SigningPoolPort) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const stats = this.signingPool.getStats();

    const details = {
      concurrency: stats.concurrency,
      activeTasks: stats.activeTasks,
      queuedTasks: stats.queuedTasks,
      maxQueuedTasks: stats.maxQueuedTasks,
      completedTasks: stats.completedTasks,
      failedTasks: stats.failedTasks,
      cancelledTasks: stats.cancelledTasks,
      averageProcessingTimeMs: Math.round(stats.averageProcessingTimeMs),
      isAcceptingTasks: stats.isAcceptingTasks,
    };

    if (stats.isHealthy) {
      return this.getStatus(key, true, details);
    }

    throw new HealthCheckError(
      'Signing pool is shutting down',
      this.getStatus(key, false, details),
    );
  }
}
