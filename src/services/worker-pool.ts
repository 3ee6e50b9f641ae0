import diagnosticsChannel from 'node:diagnostics_channel';
import { performance } from 'node:perf_hooks';

import { config } from '../config/index.js';

import { getErrorMessage } from '../utils/error-details.js';

import { FifoQueue } from './fifo-queue.js';
import { logDebug, logWarn } from './logger.js';

export type PoolTask = () => unknown;

export interface SubmitOptions {
  /** Shown in diagnostics events and failure logs. */
  label?: string;
}

export interface WorkerPoolOptions {
  size?: number;
  queueMax?: number;
}

interface QueuedJob {
  id: number;
  label: string;
  task: PoolTask;
}

export interface PoolEvent {
  v: 1;
  type: 'dispatch' | 'result' | 'error';
  workerIndex: number;
  id: number;
  label: string;
  durationMs?: number;
}

export const POOL_CHANNEL_NAME = 'page-analyzer.pool';

const poolChannel = diagnosticsChannel.channel(POOL_CHANNEL_NAME);

function publishPoolEvent(event: PoolEvent): void {
  if (!poolChannel.hasSubscribers) return;
  poolChannel.publish(event);
}

export class PoolClosedError extends Error {
  constructor() {
    super('Worker pool is shutting down');
    this.name = 'PoolClosedError';
  }
}

interface Completion<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

function createCompletion<T>(): Completion<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((onResolve, onReject) => {
    resolve = onResolve;
    reject = onReject;
  });
  return { promise, resolve, reject };
}

/**
 * Fixed set of long-lived workers pulling from one bounded FIFO queue.
 *
 * Workers are asynchronous consumers on the event loop: a task runs to
 * completion on the worker that took it, and the pool never admits more than
 * `size` tasks at once. `submit` waits while the queue holds `queueMax` jobs.
 */
export class WorkerPool {
  readonly size: number;
  readonly queueMax: number;

  private readonly queue = new FifoQueue<QueuedJob>();
  private readonly idleWorkers = new FifoQueue<
    (job: QueuedJob | undefined) => void
  >();
  private readonly blockedSubmitters = new FifoQueue<
    (admitted: boolean) => void
  >();
  private readonly workers: Promise<void>[] = [];
  private closing = false;
  private closed: Promise<void> | null = null;
  private nextJobId = 0;
  private running = 0;

  constructor(options: WorkerPoolOptions = {}) {
    this.size = Math.max(1, options.size ?? config.analysis.workerCount);
    this.queueMax = Math.max(1, options.queueMax ?? this.size * 2);

    for (let workerIndex = 0; workerIndex < this.size; workerIndex += 1) {
      this.workers.push(this.runWorker(workerIndex));
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  get active(): number {
    return this.running;
  }

  get isShuttingDown(): boolean {
    return this.closing;
  }

  /**
   * Resolves `true` once the task is queued, `false` when it was dropped
   * because the pool is shutting down.
   */
  async submit(task: PoolTask, options: SubmitOptions = {}): Promise<boolean> {
    while (!this.closing && this.queue.length >= this.queueMax) {
      const admitted = await new Promise<boolean>((resolve) => {
        this.blockedSubmitters.push(resolve);
      });
      if (!admitted) return false;
    }
    if (this.closing) return false;

    this.nextJobId += 1;
    this.enqueue({
      id: this.nextJobId,
      label: options.label ?? `task-${this.nextJobId}`,
      task,
    });
    return true;
  }

  /** Settles with the task's own result once that task has run. */
  async submitAndWait<T>(
    task: () => T | Promise<T>,
    options: SubmitOptions = {}
  ): Promise<T> {
    const completion = createCompletion<T>();

    const admitted = await this.submit(async () => {
      try {
        completion.resolve(await task());
      } catch (error) {
        completion.reject(error);
        throw error;
      }
    }, options);

    if (!admitted) throw new PoolClosedError();
    return completion.promise;
  }

  /** Stops intake, drops blocked submissions and drains queued work. */
  shutdown(): Promise<void> {
    this.closed ??= this.close();
    return this.closed;
  }

  private async close(): Promise<void> {
    this.closing = true;

    for (const release of this.blockedSubmitters.drain()) release(false);
    for (const wake of this.idleWorkers.drain()) wake(undefined);

    await Promise.all(this.workers);
    logDebug('Worker pool drained', { size: this.size });
  }

  private enqueue(job: QueuedJob): void {
    const idle = this.idleWorkers.shift();
    if (idle) {
      idle(job);
      return;
    }
    this.queue.push(job);
  }

  private take(): Promise<QueuedJob | undefined> {
    const job = this.queue.shift();
    if (job) {
      this.blockedSubmitters.shift()?.(true);
      return Promise.resolve(job);
    }
    if (this.closing) return Promise.resolve(undefined);

    return new Promise((resolve) => {
      this.idleWorkers.push(resolve);
    });
  }

  private async runWorker(workerIndex: number): Promise<void> {
    for (;;) {
      const job = await this.take();
      if (!job) return;
      await this.execute(workerIndex, job);
    }
  }

  private async execute(workerIndex: number, job: QueuedJob): Promise<void> {
    const startedAt = performance.now();
    this.running += 1;

    publishPoolEvent({
      v: 1,
      type: 'dispatch',
      workerIndex,
      id: job.id,
      label: job.label,
    });

    try {
      await job.task();
      publishPoolEvent({
        v: 1,
        type: 'result',
        workerIndex,
        id: job.id,
        label: job.label,
        durationMs: performance.now() - startedAt,
      });
    } catch (error) {
      publishPoolEvent({
        v: 1,
        type: 'error',
        workerIndex,
        id: job.id,
        label: job.label,
        durationMs: performance.now() - startedAt,
      });
      // The worker survives; the submitter owns the failure.
      logWarn('Worker pool task failed', {
        task: job.label,
        workerIndex,
        error: getErrorMessage(error),
      });
    } finally {
      this.running -= 1;
    }
  }
}

let pool: WorkerPool | null = null;

export function getOrCreateWorkerPool(): WorkerPool {
  pool ??= new WorkerPool({
    size: config.analysis.workerCount,
    queueMax: config.analysis.queueMax,
  });
  return pool;
}

export async function shutdownWorkerPool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.shutdown();
}
