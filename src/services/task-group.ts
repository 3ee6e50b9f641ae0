import { toError } from '../utils/error-details.js';

import type { WorkerPool } from './worker-pool.js';

export type TaskOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Error };

export interface TaskFailure {
  name: string;
  error: Error;
}

/** Typed slot for one task's outcome. Runs at most once. */
export class TaskHandle<T> {
  private settled: TaskOutcome<T> | undefined;

  constructor(
    readonly name: string,
    private readonly task: () => T | Promise<T>
  ) {}

  get outcome(): TaskOutcome<T> | undefined {
    return this.settled;
  }

  async run(): Promise<void> {
    if (this.settled) return;
    try {
      this.settled = { ok: true, value: await this.task() };
    } catch (error) {
      this.settled = { ok: false, error: toError(error) };
    }
  }

  /** Records a failure for a task that never got to run. */
  abandon(error: Error): void {
    this.settled ??= { ok: false, error };
  }
}

/**
 * Per-request batch of named tasks sharing one pool. `executeAll` waits for
 * every member; one failing task never stops the others.
 */
export class TaskGroup {
  private readonly handles: TaskHandle<unknown>[] = [];
  private readonly names = new Set<string>();

  constructor(private readonly pool: WorkerPool) {}

  get size(): number {
    return this.handles.length;
  }

  add<T>(name: string, task: () => T | Promise<T>): TaskHandle<T> {
    if (this.names.has(name)) {
      throw new Error(`Task "${name}" is already part of this group`);
    }

    const handle = new TaskHandle(name, task);
    this.names.add(name);
    this.handles.push(handle);
    return handle;
  }

  async executeAll(): Promise<void> {
    await Promise.all(this.handles.map((handle) => this.dispatch(handle)));
  }

  private async dispatch(handle: TaskHandle<unknown>): Promise<void> {
    try {
      await this.pool.submitAndWait(() => handle.run(), {
        label: handle.name,
      });
    } catch (error) {
      handle.abandon(toError(error));
    }
  }

  /** `undefined` for names outside the group and tasks that have not run. */
  getResult(name: string): TaskOutcome<unknown> | undefined {
    return this.handles.find((handle) => handle.name === name)?.outcome;
  }

  failures(): TaskFailure[] {
    const failed: TaskFailure[] = [];
    for (const handle of this.handles) {
      const { outcome } = handle;
      if (outcome && !outcome.ok) {
        failed.push({ name: handle.name, error: outcome.error });
      }
    }
    return failed;
  }

  hasErrors(): boolean {
    return this.failures().length > 0;
  }
}
