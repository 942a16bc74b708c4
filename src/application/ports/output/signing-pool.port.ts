/**
 * A unit of background work. `cancel` runs instead of `run` when the pool
 * shuts down before the task started.
 */
export interface PoolTask {
  id: string;
  run(): Promise<void>;
  cancel(reason: string): Promise<void>;
}

/**
 * Signing Pool Statistics
 */
export interface SigningPoolStats {
  concurrency: number;
  activeTasks: number;
  queuedTasks: number;
  reservedSlots: number;
  maxQueuedTasks: number;
  completedTasks: number;
  failedTasks: number;
  cancelledTasks: number;
  averageProcessingTimeMs: number;
  isAcceptingTasks: boolean;
  isHealthy: boolean;
}

/**
 * Signing Pool Port (Driven Port)
 * Bounded executor for background signing units.
 */
export interface SigningPoolPort {
  /**
   * Check if the pool can take one more task right now
   */
  hasCapacity(): boolean;

  /**
   * Hold a slot for `taskId` until it is scheduled or released. Held slots
   * count against capacity, so callers that do slow work between admission
   * and scheduling cannot overfill the queue. Throws ServiceBusyError when
   * no slot is free or the pool is shutting down.
   */
  reserve(taskId: string): void;

  /**
   * Give back a slot held by `reserve`. No-op once the task was scheduled.
   */
  release(taskId: string): void;

  /**
   * Start the task when a slot is free, otherwise queue it. Returns without
   * waiting for the task. Consumes the slot reserved for `task.id`, if any.
   * Throws ServiceBusyError when the pool is shutting down, or when no slot
   * was reserved and the queue is full.
   */
  schedule(task: PoolTask): void;

  getStats(): SigningPoolStats;

  /**
   * Resolve once no task is running or queued
   */
  waitForIdle(): Promise<void>;

  /**
   * Stop accepting tasks, cancel queued ones and wait for running ones
   */
  shutdown(): Promise<void>;
}

export const SHUTDOWN_CANCEL_REASON = 'Signing cancelled: service shut down before the job started';
