/**
 * @module plugins/tasks/scheduler
 *
 * Submission path and bounded worker pool. Workers claim tasks through
 * {@link TaskQueue.claimNext}, call the executor, and finalize through the
 * queue. The scheduler arms a server-side timeout per task; on expiry it
 * fails the task with `ExecutionTimeout`, aborts the executor's signal, and
 * frees both the thread slot and the worker.
 *
 * Transient executor failures are retried with exponential backoff up to
 * `maxAttempts`; every other failure finalizes the task at once.
 */
import type { RuntimeConfig, StructuredLogger } from '../../core/kernel/contracts.js';
import { backoffDelay, sleep } from '../../core/utils/timing.js';
import { NotFoundError, TransientError, ValidationError, errorMessage } from '../../errors.js';
import type { ThreadRegistry } from '../threads/thread-registry.js';
import type { TaskQueue } from './task-queue.js';
import type { CompleteTaskInput, QueueStatus, Task, TaskErrorKind, TaskExecutor, TaskStep } from './types.js';

const MAX_RETRY_DELAY_MS = 30_000;
const DEFAULT_SHUTDOWN_GRACE_MS = 5_000;
const IMPLICIT_THREAD_TITLE = 'New Thread';

export interface SchedulerStatus extends QueueStatus {
  workers: { total: number; busy: number };
}

export interface TaskSchedulerOptions {
  queue: TaskQueue;
  threads: ThreadRegistry;
  executor: TaskExecutor;
  config: RuntimeConfig['scheduler'];
  logger: StructuredLogger;
  onStep?: (task: Task, workerId: string, step: TaskStep) => void;
  shutdownGraceMs?: number;
}

interface InFlight {
  taskId: string;
  workerId: string;
  controller: AbortController;
  timer: NodeJS.Timeout;
  done: Promise<void>;
}

export class TaskScheduler {
  private readonly idleWorkers: string[];
  private readonly inFlight = new Map<string, InFlight>();
  private started = false;
  private stopping = false;

  constructor(private readonly options: TaskSchedulerOptions) {
    this.idleWorkers = Array.from({ length: options.config.maxConcurrentTasks }, (_, index) => `worker-${index}`);
  }

  /** True between start and stop; the system status reports it as readiness. */
  get isRunning(): boolean {
    return this.started && !this.stopping;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.stopping = false;
    this.options.logger.info('Task scheduler started', { workers: this.options.config.maxConcurrentTasks });
    this.pump();
  }

  /**
   * Creates a queued task on `threadId` and appends its id to the thread.
   * Unknown threads fail with NotFound unless `implicitThreads` is enabled,
   * in which case the thread is created under the given id.
   */
  async submit(threadId: string, prompt: string): Promise<Task> {
    const text = prompt.trim();
    if (!text) {
      throw new ValidationError('Prompt must not be empty');
    }
    if (this.stopping) {
      throw new ValidationError('Scheduler is shutting down');
    }

    const { threads, queue } = this.options;
    if (!threads.has(threadId)) {
      if (!this.options.config.implicitThreads) {
        throw new NotFoundError('Thread', threadId);
      }
      await threads.create(IMPLICIT_THREAD_TITLE, threadId);
    }

    const task = await threads.appendTask(threadId, () => queue.enqueue(threadId, text));
    this.options.logger.info('Task submitted', { taskId: task.id, threadId });
    this.pump();
    return task;
  }

  status(taskId: string): Task {
    return this.options.queue.get(taskId);
  }

  queueStatus(): SchedulerStatus {
    return {
      ...this.options.queue.status(),
      workers: {
        total: this.options.config.maxConcurrentTasks,
        busy: this.inFlight.size
      }
    };
  }

  /** Finalizes a running task on behalf of an external worker; idempotent on terminal tasks. */
  complete(taskId: string, result: CompleteTaskInput['result']): Task {
    const current = this.options.queue.get(taskId);
    const startedAt = current.started_at ? Date.parse(current.started_at) : Date.now();
    const outcome = this.options.queue.complete(taskId, {
      ...result,
      execution_time: result.execution_time ?? Math.max(0, (Date.now() - startedAt) / 1000)
    });
    this.settle(taskId);
    return outcome.task;
  }

  /** Fails a queued or running task; idempotent on terminal tasks. */
  fail(taskId: string, message: string, kind: TaskErrorKind = 'ExecutionFailed'): Task {
    const current = this.options.queue.get(taskId);
    const outcome = this.options.queue.fail(taskId, { kind, message, attempts: current.attempts });
    this.settle(taskId);
    return outcome.task;
  }

  /** Cancels every outstanding task of a deleted thread. */
  cancelThread(threadId: string): number {
    let cancelled = 0;
    for (const task of this.options.queue.outstandingFor(threadId)) {
      const outcome = this.options.queue.fail(task.id, {
        kind: 'Cancelled',
        message: 'thread deleted',
        attempts: task.attempts
      });
      if (outcome.applied) cancelled++;
      this.settle(task.id);
    }
    if (cancelled > 0) {
      this.options.logger.info('Cancelled tasks of deleted thread', { threadId, cancelled });
    }
    return cancelled;
  }

  /**
   * Stops claiming, fails every in-flight task with `ExecutionFailed`
   * ("shutdown") and waits up to the grace period for workers to return.
   */
  async stop(): Promise<void> {
    if (!this.started) return;
    this.stopping = true;
    const running = [...this.inFlight.values()];
    for (const flight of running) {
      const current = this.options.queue.get(flight.taskId);
      this.options.queue.fail(flight.taskId, { kind: 'ExecutionFailed', message: 'shutdown', attempts: current.attempts });
      this.settle(flight.taskId);
    }

    const grace = this.options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
    const graceTimer = new AbortController();
    await Promise.race([
      Promise.allSettled(running.map((flight) => flight.done)),
      sleep(grace, graceTimer.signal)
    ]);
    graceTimer.abort();
    await this.options.queue.flush();
    this.started = false;
    this.options.logger.info('Task scheduler stopped', { aborted: running.length });
  }

  private pump(): void {
    if (!this.started || this.stopping) return;
    while (this.idleWorkers.length > 0) {
      const workerId = this.idleWorkers[0];
      const task = this.options.queue.claimNext(workerId);
      if (!task) return;
      this.idleWorkers.shift();
      this.launch(task, workerId);
    }
  }

  private launch(task: Task, workerId: string): void {
    const controller = new AbortController();
    const timeoutMs = this.options.config.taskTimeoutMs;
    const timer = setTimeout(() => {
      const current = this.options.queue.get(task.id);
      const outcome = this.options.queue.fail(task.id, {
        kind: 'ExecutionTimeout',
        message: `Task exceeded ${timeoutMs}ms`,
        attempts: current.attempts
      });
      if (outcome.applied) {
        this.options.logger.warn('Task timed out', { taskId: task.id, workerId, timeoutMs });
      }
      this.settle(task.id);
    }, timeoutMs);

    const flight: InFlight = {
      taskId: task.id,
      workerId,
      controller,
      timer,
      done: Promise.resolve()
    };
    this.inFlight.set(task.id, flight);
    flight.done = this.run(task, workerId, controller.signal)
      .catch((error: unknown) => {
        this.options.logger.error('Worker crashed', { taskId: task.id, workerId, reason: errorMessage(error) });
        this.options.queue.fail(task.id, { kind: 'ExecutionFailed', message: errorMessage(error), attempts: 0 });
      })
      .finally(() => this.settle(task.id));
  }

  private async run(task: Task, workerId: string, signal: AbortSignal): Promise<void> {
    const { queue, executor, logger, config } = this.options;
    if (!this.options.threads.has(task.thread_id)) {
      queue.fail(task.id, { kind: 'Cancelled', message: 'thread deleted', attempts: 0 });
      return;
    }
    const thread = this.options.threads.get(task.thread_id);
    const startedAt = Date.now();

    for (let attempt = 1; ; attempt++) {
      queue.recordAttempt(task.id, attempt);
      try {
        const output = await executor.execute({
          task,
          thread,
          attempt,
          signal,
          onStep: (step) => {
            if (!signal.aborted) this.options.onStep?.(task, workerId, step);
          }
        });
        if (signal.aborted) return;
        queue.complete(task.id, {
          response: output.response,
          execution_time: (Date.now() - startedAt) / 1000,
          actions_taken: output.actions_taken ?? [],
          tools_forged: output.tools_forged ?? [],
          agents_spawned: output.agents_spawned ?? []
        });
        return;
      } catch (error) {
        if (signal.aborted) return;
        if (error instanceof TransientError && attempt < config.maxAttempts) {
          const delay = backoffDelay(attempt, config.retryBackoffMs, MAX_RETRY_DELAY_MS);
          logger.warn('Transient executor failure, retrying', {
            taskId: task.id,
            attempt,
            delayMs: delay,
            reason: error.message
          });
          await sleep(delay, signal);
          if (signal.aborted) return;
          continue;
        }
        queue.fail(task.id, { kind: 'ExecutionFailed', message: errorMessage(error), attempts: attempt });
        return;
      }
    }
  }

  /** Frees the worker of a finalized task, aborts its executor call, and claims more work. */
  private settle(taskId: string): void {
    const flight = this.inFlight.get(taskId);
    if (flight) {
      this.inFlight.delete(taskId);
      clearTimeout(flight.timer);
      flight.controller.abort();
      this.idleWorkers.push(flight.workerId);
    }
    this.pump();
  }
}
