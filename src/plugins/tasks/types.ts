import { z } from 'zod';
import type { Thread } from '../threads/types.js';

export const TASK_STATUSES = ['queued', 'running', 'completed', 'failed'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

/** Statuses only move to a higher rank. */
export const STATUS_RANK: Record<TaskStatus, number> = {
  queued: 0,
  running: 1,
  completed: 2,
  failed: 2,
};

export function isTerminal(status: TaskStatus): boolean {
  return STATUS_RANK[status] === 2;
}

export const TASK_ERROR_KINDS = ['ExecutionTimeout', 'ExecutionFailed', 'Cancelled'] as const;
export type TaskErrorKind = (typeof TASK_ERROR_KINDS)[number];

export const TaskResultSchema = z.object({
  response: z.string(),
  /** Seconds, measured by the worker. */
  execution_time: z.number().nonnegative(),
  actions_taken: z.array(z.string()),
  tools_forged: z.array(z.string()),
  agents_spawned: z.array(z.string()),
});
export type TaskResult = z.infer<typeof TaskResultSchema>;

export const TaskErrorSchema = z.object({
  kind: z.enum(TASK_ERROR_KINDS),
  message: z.string(),
  attempts: z.number().int().nonnegative(),
});
export type TaskError = z.infer<typeof TaskErrorSchema>;

export const TaskSchema = z.object({
  id: z.string(),
  thread_id: z.string(),
  prompt: z.string(),
  status: z.enum(TASK_STATUSES),
  worker_id: z.string().nullable(),
  result: TaskResultSchema.nullable(),
  error: TaskErrorSchema.nullable(),
  attempts: z.number().int().nonnegative(),
  created_at: z.string(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
});
export type Task = z.infer<typeof TaskSchema>;

export const TaskDocumentSchema = z.object({
  tasks: z.array(TaskSchema),
});
export type TaskDocument = z.infer<typeof TaskDocumentSchema>;

export interface ThreadQueueStatus {
  active_task_id: string | null;
  queued: number;
  running: number;
  completed: number;
  failed: number;
}

export interface QueueStatus {
  queued_count: number;
  running_count: number;
  completed_count: number;
  failed_count: number;
  per_thread_status: Record<string, ThreadQueueStatus>;
}

export interface TaskStep {
  agent: string;
  content: string;
  kind?: string;
}

export interface TaskExecutionRequest {
  task: Task;
  thread: Thread;
  attempt: number;
  /** Aborted on timeout, cancellation and shutdown. */
  signal: AbortSignal;
  onStep(step: TaskStep): void;
}

export interface TaskExecutionOutput {
  response: string;
  actions_taken?: string[];
  tools_forged?: string[];
  agents_spawned?: string[];
}

/** Produces task results. Throw `TransientError` for failures worth another attempt. */
export interface TaskExecutor {
  execute(request: TaskExecutionRequest): Promise<TaskExecutionOutput>;
}

export const SubmitTaskInputSchema = z.object({
  thread_id: z.string().min(1),
  prompt: z.string().trim().min(1, 'Prompt must not be empty'),
});

export const CompleteTaskInputSchema = z.object({
  task_id: z.string().min(1),
  result: z.object({
    response: z.string(),
    execution_time: z.number().nonnegative().optional(),
    actions_taken: z.array(z.string()).default([]),
    tools_forged: z.array(z.string()).default([]),
    agents_spawned: z.array(z.string()).default([]),
  }),
});

export type CompleteTaskInput = z.infer<typeof CompleteTaskInputSchema>;

export const FailTaskInputSchema = z.object({
  task_id: z.string().min(1),
  message: z.string().min(1),
});
