import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter } from 'events';
import type { AppConfig } from '../config/configuration';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import {
  SHUTDOWN_CANCEL_REASON,
  type PoolTask,
  type SigningPoolPort,
  type SigningPoolStats,
} from '../application/ports/output/signing-pool.port';
import { ServiceBusyError, errorMessage } from '../domain/errors/signing-service.errors';

/**
 * Task waiting for a free slot, with the time it was queued for queue-time
 * metrics.
 */
interface QueuedTask {
  task: PoolTask;
  queuedAt: Date;
}

export interface TaskSettledEvent {
  taskId: string;
  durationMs: number;
  error?: string;
}

/**
 * Signing Pool Service
 *
 * Bounded executor for background signing units. Signing itself happens in a
 * child process, so units run on the main event loop and only their number
 * is limited.
 *
 * - At most `SIGNING_CONCURRENCY` units run at once
 * - At most `MAX_QUEUED_JOBS` more wait, in FIFO order
 * - `reserve` holds a slot ahead of `schedule`; running, queued and held
 *   slots together never exceed `SIGNING_CONCURRENCY + MAX_QUEUED_JOBS`
 * - `schedule` never waits for the unit; it throws `ServiceBusyError` when
 *   the queue is full or the pool is shutting down
 *
 * On shutdown, queued units are cancelled (their `cancel` hook runs instead
 * of `run`) and running units are allowed to finish.
 *
 * Emits `taskCompleted` and `taskFailed` with a {@link TaskSettledEvent}.
 */
@Injectable()
export class SigningPoolService
  extends EventEmitter
  implements SigningPoolPort, OnModuleDestroy
{
  private taskQueue: QueuedTask[] = [];

  /** Units currently running, indexed by task id. */
  private runningTasks: Map<string, Promise<void>> = new Map();

  /** Task ids holding a slot between `reserve` and `schedule`. */
  private reservations: Set<string> = new Set();

  private idleWaiters: Array<() => void> = [];

  private isShuttingDown = false;

  private readonly concurrency: number;
  private readonly maxQueuedTasks: number;

  private completedTasksCount = 0;
  private failedTasksCount = 0;
  private cancelledTasksCount = 0;
  private totalProcessingTimeMs = 0;

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    super();

    const poolConfig = this.configService.get('signingPool', { infer: true });
    this.concurrency = poolConfig.concurrency;
    this.maxQueuedTasks = poolConfig.maxQueuedJobs;

    this.logger.setContext(SigningPoolService.name);
  }

  async onModuleDestroy(): Promise<void> {
    await this.shutdown();
  }

  hasCapacity(): boolean {
    if (this.isShuttingDown) {
      return false;
    }
    const occupied = this.runningTasks.size + this.taskQueue.length + this.reservations.size;
    return occupied < this.concurrency + this.maxQueuedTasks;
  }

  reserve(taskId: string): void {
    if (this.isShuttingDown) {
      throw ServiceBusyError.forShutdown();
    }
    if (this.reservations.has(taskId)) {
      return;
    }
    if (!this.hasCapacity()) {
      throw new ServiceBusyError();
    }
    this.reservations.add(taskId);
  }

  release(taskId: string): void {
    this.reservations.delete(taskId);
  }

  schedule(task: PoolTask): void {
    const reserved = this.reservations.delete(task.id);

    if (this.isShuttingDown) {
      throw ServiceBusyError.forShutdown();
    }
    if (!reserved && !this.hasCapacity()) {
      throw new ServiceBusyError();
    }

    const queuedTask: QueuedTask = { task, queuedAt: new Date() };

    if (this.runningTasks.size < this.concurrency) {
      this.dispatch(queuedTask);
      return;
    }

    this.taskQueue.push(queuedTask);
    this.logger.debug({ taskId: task.id, queueLength: this.taskQueue.length }, 'Task queued');
  }

  private dispatch(queuedTask: QueuedTask): void {
    const { task } = queuedTask;

    this.logger.debug(
      { taskId: task.id, queuedForMs: Date.now() - queuedTask.queuedAt.getTime() },
      'Task started',
    );

    const execution = this.execute(task).finally(() => {
      this.runningTasks.delete(task.id);
      this.processNextInQueue();
      this.notifyIfIdle();
    });

    this.runningTasks.set(task.id, execution);
  }

  private async execute(task: PoolTask): Promise<void> {
    const startedAt = Date.now();

    try {
      await task.run();
      const durationMs = Date.now() - startedAt;
      this.completedTasksCount++;
      this.totalProcessingTimeMs += durationMs;
      this.emit('taskCompleted', { taskId: task.id, durationMs } satisfies TaskSettledEvent);
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      this.failedTasksCount++;
      this.totalProcessingTimeMs += durationMs;
      this.logger.error({ taskId: task.id, error: errorMessage(error) }, 'Task failed');
      this.emit('taskFailed', {
        taskId: task.id,
        durationMs,
        error: errorMessage(error),
      } satisfies TaskSettledEvent);
    }
  }

  private processNextInQueue(): void {
    if (this.isShuttingDown) return;

    while (this.runningTasks.size < this.concurrency) {
      const queuedTask = this.taskQueue.shift();
      if (!queuedTask) return;
      this.dispatch(queuedTask);
    }
  }

  private isIdle(): boolean {
    return this.runningTasks.size === 0 && this.taskQueue.length === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  waitForIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  getStats(): SigningPoolStats {
    const settled = this.completedTasksCount + this.failedTasksCount;

    return {
      concurrency: this.concurrency,
      activeTasks: this.runningTasks.size,
      queuedTasks: this.taskQueue.length,
      reservedSlots: this.reservations.size,
      maxQueuedTasks: this.maxQueuedTasks,
      completedTasks: this.completedTasksCount,
      failedTasks: this.failedTasksCount,
      cancelledTasks: this.cancelledTasksCount,
      averageProcessingTimeMs: settled > 0 ? this.totalProcessingTimeMs / settled : 0,
      isAcceptingTasks: this.hasCapacity(),
      isHealthy: !this.isShuttingDown,
    };
  }

  async shutdown(): Promise<void> {
    if (!this.isShuttingDown) {
      this.isShuttingDown = true;
      this.logger.info(
        { activeTasks: this.runningTasks.size, queuedTasks: this.taskQueue.length },
        'Shutting down signing pool',
      );

      const cancelled = this.taskQueue;
      this.taskQueue = [];
      await Promise.all(cancelled.map((queuedTask) => this.cancel(queuedTask.task)));
      this.notifyIfIdle();
    }

    await this.waitForIdle();
    this.logger.info('Signing pool shut down');
  }

  private async cancel(task: PoolTask): Promise<void> {
    try {
      await task.cancel(SHUTDOWN_CANCEL_REASON);
      this.cancelledTasksCount++;
    } catch (error) {
      this.logger.error({ taskId: task.id, error: errorMessage(error) }, 'Failed to cancel task');
    }
  }
}
