/**
 * Deferred invocation.
 *
 * A handle's `delay` hands an invocation to a `TaskExecutor` and returns a
 * task id immediately. Queueing and retries belong to the executor; the
 * dispatch layer only submits.
 */

import { randomUUID } from 'node:crypto';
import { setImmediate as nextMacrotask } from 'node:timers/promises';
import type { DispatchEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';

const log = createLogger({ component: 'task-executor' });

/**
 * Work handed to an executor.
 */
export interface DeferredTask {
  /** Dotted path of the resource */
  path: string;

  input: unknown;

  /** Caller scope at submission time */
  scope?: string;

  /** Runs the invocation */
  run: () => Promise<unknown>;
}

export interface TaskHandle {
  taskId: string;
}

export type TaskState = 'pending' | 'running' | 'succeeded' | 'failed';

export interface TaskStatus {
  taskId: string;
  path: string;
  state: TaskState;
  result?: unknown;
  error?: Error;
  submittedAt: Date;
  finishedAt?: Date;
}

/**
 * Executor of deferred invocations.
 */
export interface TaskExecutor {
  submit(task: DeferredTask): Promise<TaskHandle>;

  /**
   * Status of a submitted task, undefined when unknown to this executor.
   */
  status(taskId: string): Promise<TaskStatus | undefined>;
}

export interface InProcessTaskExecutorOptions {
  events?: DispatchEventEmitter;

  /** Number of finished statuses kept (oldest dropped first) */
  maxRetained?: number;
}

/**
 * Executor running tasks in this process on a later macrotask.
 *
 * @example
 * ```typescript
 * const executor = new InProcessTaskExecutor();
 * const { taskId } = await dispatch.resolve('reports.build').delay({ month: 5 });
 * await executor.drain();
 * (await executor.status(taskId))?.state; // 'succeeded'
 * ```
 */
export class InProcessTaskExecutor implements TaskExecutor {
  private readonly statuses: Map<string, TaskStatus> = new Map();
  private readonly inFlight: Set<Promise<void>> = new Set();
  private readonly events: DispatchEventEmitter | undefined;
  private readonly maxRetained: number;

  constructor(options: InProcessTaskExecutorOptions = {}) {
    this.events = options.events;
    this.maxRetained = options.maxRetained ?? 1000;
  }

  async submit(task: DeferredTask): Promise<TaskHandle> {
    const taskId = randomUUID();
    const status: TaskStatus = { taskId, path: task.path, state: 'pending', submittedAt: new Date() };
    this.statuses.set(taskId, status);

    log.debug('Task submitted', { operation: 'submit', task_id: taskId, path: task.path });
    this.events?.emitTaskSubmitted(taskId, task.path);

    const execution = this.execute(status, task);
    this.inFlight.add(execution);
    void execution.finally(() => this.inFlight.delete(execution));

    return { taskId };
  }

  async status(taskId: string): Promise<TaskStatus | undefined> {
    const status = this.statuses.get(taskId);
    return status ? { ...status } : undefined;
  }

  /**
   * Wait until every submitted task has finished.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  /**
   * Number of tasks not finished yet.
   */
  get pending(): number {
    return this.inFlight.size;
  }

  private async execute(status: TaskStatus, task: DeferredTask): Promise<void> {
    await nextMacrotask();
    status.state = 'running';

    try {
      status.result = await task.run();
      status.state = 'succeeded';
      this.events?.emitTaskSucceeded(status.taskId, task.path);
      log.debug('Task succeeded', { operation: 'execute', task_id: status.taskId, path: task.path });
    } catch (error) {
      status.state = 'failed';
      status.error = error instanceof Error ? error : new Error(String(error));
      this.events?.emitTaskFailed(status.taskId, task.path, status.error);
      log.error('Task failed', {
        operation: 'execute',
        task_id: status.taskId,
        path: task.path,
        error_message: status.error.message,
      });
    } finally {
      status.finishedAt = new Date();
      this.prune();
    }
  }

  private prune(): void {
    for (const [taskId, status] of this.statuses) {
      if (this.statuses.size <= this.maxRetained) {
        return;
      }
      if (status.finishedAt) {
        this.statuses.delete(taskId);
      }
    }
  }
}
