/**
 * @module plugins/tasks/task-queue
 *
 * Authoritative task store and status state machine. Every transition is a
 * synchronous check-and-set on the task's current status, so two workers can
 * never claim the same task and a task is finalized at most once. Statuses
 * only move forward: queued -> running -> completed | failed.
 *
 * The queue also owns each thread's "active task" slot: a queued task is
 * only claimable while no other task of its thread is running.
 */
import { randomUUID } from 'node:crypto';
import type { StructuredLogger } from '../../core/kernel/contracts.js';
import type { DocumentStore } from '../../core/store/json-store.js';
import { InvalidTransitionError, NotFoundError, errorMessage } from '../../errors.js';
import {
  isTerminal,
  type QueueStatus,
  type Task,
  type TaskDocument,
  type TaskError,
  type TaskResult,
  type TaskStatus,
  type ThreadQueueStatus
} from './types.js';

export interface TaskChange {
  task: Task;
  previous: TaskStatus | null;
}

export interface FinalizeOutcome {
  task: Task;
  /** False when the task was already terminal and the call changed nothing. */
  applied: boolean;
}

export interface RecoveryReport {
  requeued: number;
  interrupted: number;
}

export interface TaskQueueOptions {
  store: DocumentStore<TaskDocument>;
  logger: StructuredLogger;
  onChange?: (change: TaskChange) => void;
  now?: () => Date;
  generateId?: () => string;
}

function cloneTask(task: Task): Task {
  return {
    ...task,
    result: task.result
      ? {
          ...task.result,
          actions_taken: [...task.result.actions_taken],
          tools_forged: [...task.result.tools_forged],
          agents_spawned: [...task.result.agents_spawned]
        }
      : null,
    error: task.error ? { ...task.error } : null
  };
}

function uniqueSorted(values: readonly string[]): string[] {
  return [...new Set(values)].sort();
}

export class TaskQueue {
  private readonly tasks = new Map<string, Task>();
  /** Queued task ids, oldest first. */
  private pending: string[] = [];
  private readonly activeByThread = new Map<string, string>();
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private lastWrite: Promise<void> = Promise.resolve();

  constructor(private readonly options: TaskQueueOptions) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Restores persisted tasks. A task found `running` lost its worker with the
   * previous process and is failed; `queued` tasks re-enter the queue in
   * creation order.
   */
  async load(): Promise<RecoveryReport> {
    const document = await this.options.store.load();
    this.tasks.clear();
    this.pending = [];
    this.activeByThread.clear();

    const report: RecoveryReport = { requeued: 0, interrupted: 0 };
    const restored = [...(document?.tasks ?? [])].sort((a, b) => a.created_at.localeCompare(b.created_at));
    for (const task of restored) {
      this.tasks.set(task.id, task);
      if (task.status === 'running') {
        task.status = 'failed';
        task.error = { kind: 'ExecutionFailed', message: 'interrupted by restart', attempts: task.attempts };
        task.completed_at = this.now().toISOString();
        report.interrupted++;
      } else if (task.status === 'queued') {
        this.pending.push(task.id);
        report.requeued++;
      }
    }

    if (report.interrupted > 0) {
      this.options.logger.warn('Failed tasks interrupted by restart', { count: report.interrupted });
      this.persist();
    }
    return report;
  }

  /** Creates a queued task. Only the scheduler's submit path calls this. */
  enqueue(threadId: string, prompt: string): Task {
    const task: Task = {
      id: this.generateId(),
      thread_id: threadId,
      prompt,
      status: 'queued',
      worker_id: null,
      result: null,
      error: null,
      attempts: 0,
      created_at: this.now().toISOString(),
      started_at: null,
      completed_at: null
    };
    this.tasks.set(task.id, task);
    this.pending.push(task.id);
    this.changed(task, null);
    return cloneTask(task);
  }

  /**
   * Atomically claims the oldest queued task whose thread has no running
   * task, binding it to `workerId`. Returns null when nothing is claimable.
   */
  claimNext(workerId: string): Task | null {
    for (let index = 0; index < this.pending.length; index++) {
      const task = this.tasks.get(this.pending[index]);
      if (!task || task.status !== 'queued') {
        this.pending.splice(index, 1);
        index--;
        continue;
      }
      if (this.activeByThread.has(task.thread_id)) {
        continue;
      }

      this.pending.splice(index, 1);
      task.status = 'running';
      task.worker_id = workerId;
      task.started_at = this.now().toISOString();
      this.activeByThread.set(task.thread_id, task.id);
      this.changed(task, 'queued');
      return cloneTask(task);
    }
    return null;
  }

  recordAttempt(taskId: string, attempt: number): void {
    const task = this.tasks.get(taskId);
    if (!task || task.status !== 'running') return;
    task.attempts = attempt;
    this.persist();
  }

  /** Finalizes a running task as completed. Repeating it on a terminal task returns that record. */
  complete(taskId: string, result: TaskResult): FinalizeOutcome {
    const task = this.require(taskId);
    if (isTerminal(task.status)) {
      return { task: cloneTask(task), applied: false };
    }
    if (task.status !== 'running') {
      throw new InvalidTransitionError('Task', task.status, 'complete');
    }

    task.status = 'completed';
    task.result = {
      response: result.response,
      execution_time: result.execution_time,
      actions_taken: uniqueSorted(result.actions_taken),
      tools_forged: uniqueSorted(result.tools_forged),
      agents_spawned: uniqueSorted(result.agents_spawned)
    };
    task.completed_at = this.now().toISOString();
    this.release(task);
    this.changed(task, 'running');
    return { task: cloneTask(task), applied: true };
  }

  /**
   * Finalizes a queued or running task as failed. Repeating it on a terminal
   * task returns that record unchanged.
   */
  fail(taskId: string, error: TaskError): FinalizeOutcome {
    const task = this.require(taskId);
    if (isTerminal(task.status)) {
      return { task: cloneTask(task), applied: false };
    }

    const previous = task.status;
    task.status = 'failed';
    task.error = { ...error };
    task.completed_at = this.now().toISOString();
    if (previous === 'queued') {
      this.pending = this.pending.filter((id) => id !== task.id);
    }
    this.release(task);
    this.changed(task, previous);
    return { task: cloneTask(task), applied: true };
  }

  get(taskId: string): Task {
    return cloneTask(this.require(taskId));
  }

  find(taskId: string): Task | undefined {
    const task = this.tasks.get(taskId);
    return task ? cloneTask(task) : undefined;
  }

  forThread(threadId: string): Task[] {
    return [...this.tasks.values()]
      .filter((task) => task.thread_id === threadId)
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .map(cloneTask);
  }

  /** Non-terminal tasks of a thread, oldest first. */
  outstandingFor(threadId: string): Task[] {
    return this.forThread(threadId).filter((task) => !isTerminal(task.status));
  }

  running(): Task[] {
    return [...this.tasks.values()].filter((task) => task.status === 'running').map(cloneTask);
  }

  activeTaskFor(threadId: string): string | null {
    return this.activeByThread.get(threadId) ?? null;
  }

  hasClaimable(): boolean {
    return this.pending.some((id) => {
      const task = this.tasks.get(id);
      return task !== undefined && task.status === 'queued' && !this.activeByThread.has(task.thread_id);
    });
  }

  status(): QueueStatus {
    const status: QueueStatus = {
      queued_count: 0,
      running_count: 0,
      completed_count: 0,
      failed_count: 0,
      per_thread_status: {}
    };

    for (const task of this.tasks.values()) {
      const perThread: ThreadQueueStatus = status.per_thread_status[task.thread_id] ?? {
        active_task_id: this.activeByThread.get(task.thread_id) ?? null,
        queued: 0,
        running: 0,
        completed: 0,
        failed: 0
      };
      status.per_thread_status[task.thread_id] = perThread;
      perThread[task.status] += 1;
      status[`${task.status}_count`] += 1;
    }
    return status;
  }

  /** Resolves once the latest state has been written. */
  async flush(): Promise<void> {
    await this.lastWrite;
    await this.options.store.flush();
  }

  private require(taskId: string): Task {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new NotFoundError('Task', taskId);
    }
    return task;
  }

  private release(task: Task): void {
    if (this.activeByThread.get(task.thread_id) === task.id) {
      this.activeByThread.delete(task.thread_id);
    }
  }

  private changed(task: Task, previous: TaskStatus | null): void {
    this.persist();
    this.options.onChange?.({ task: cloneTask(task), previous });
  }

  private persist(): void {
    this.lastWrite = this.options.store
      .save({ tasks: [...this.tasks.values()] })
      .catch((error: unknown) => {
        this.options.logger.error('Failed to persist tasks', { reason: errorMessage(error) });
      });
  }
}
