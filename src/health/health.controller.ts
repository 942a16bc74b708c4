import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService, MemoryHealthIndicator } from '@nestjs/terminus';
import { CheckDependenciesUseCase } from '../application/use-cases/check-dependencies.use-case';
import type { DependencyReport } from '../application/ports/input/check-dependencies.port';
import { SigningPoolHealthIndicator } from './indicators/signing-pool.health';
import { DiskSpaceHealthIndicator } from './indicators/disk-space.health';

const HEAP_LIMIT_BYTES = 500 * 1024 * 1024; // 500MB

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly signingPoolHealth: SigningPoolHealthIndicator,
    private readonly diskSpaceHealth: DiskSpaceHealthIndicator,
    private readonly checkDependencies: CheckDependenciesUseCase,
  ) {}

  /**
   * Dependency report; always 200; callers read the individual flags.
   */
  @Get()
  check(): Promise<DependencyReport> {
    return this.checkDependencies.execute();
  }

  @Get('live')
  @HealthCheck()
  liveness() {
    return this.health.check([() => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES)]);
  }

  @Get('ready')
  @HealthCheck()
  readiness() {
    return this.health.check([
      () => this.signingPoolHealth.isHealthy('signing_pool'),
      () => this.diskSpaceHealth.isHealthy('disk_space'),
    ]);
  }
}
