/**
 * @module plugins/tasks
 *
 * Task Queue and Scheduler plugin. Owns task lifecycle, the bounded worker
 * pool and the per-thread "active task" slot, and bridges every transition to
 * the chat channel.
 *
 * Routes: POST /api/tasks/submit, GET /api/tasks/status/:id,
 *         GET /api/tasks/queue/status, GET /api/threads/:id
 * RPC:    tasks.submit, tasks.status, tasks.queueStatus, tasks.complete, tasks.fail
 */
import { z } from 'zod';
import type { TaskdeckPlugin } from '../../core/kernel/contracts.js';
import { json, parseInput, readInput } from '../../core/gateway/http.js';
import { errorMessage } from '../../errors.js';
import { LoopbackExecutor } from './executor.js';
import { TaskQueue } from './task-queue.js';
import { TaskScheduler } from './scheduler.js';
import {
  CompleteTaskInputSchema,
  FailTaskInputSchema,
  SubmitTaskInputSchema,
  TaskDocumentSchema,
  isTerminal,
  type Task,
  type TaskExecutor,
  type TaskStatus,
  type TaskStep
} from './types.js';

declare module '../../core/kernel/contracts.js' {
  interface ServiceMap {
    'tasks.queue': TaskQueue;
    'tasks.scheduler': TaskScheduler;
  }
}

declare module '../../core/kernel/event-bus.js' {
  interface EventMap {
    'tasks:updated': { task: Task; previous: TaskStatus | null };
    'tasks:step': { task_id: string; thread_id: string; worker_id: string; step: TaskStep };
  }
}

const PLUGIN_ID = 'taskdeck.tasks';
const MEMORY_SUMMARY_LENGTH = 160;

const TaskIdSchema = z.object({ task_id: z.string().min(1) });

export interface TasksPluginOptions {
  executor?: TaskExecutor;
  shutdownGraceMs?: number;
}

export function createTasksPlugin(options: TasksPluginOptions = {}): TaskdeckPlugin {
  let scheduler: TaskScheduler | undefined;
  const unsubscribers: Array<() => void> = [];

  return {
    manifest: {
      id: PLUGIN_ID,
      name: 'Task Scheduler',
      version: '0.1.0',
      description: 'Task queue, worker pool and per-thread execution discipline',
      dependencies: ['taskdeck.threads', 'taskdeck.memory'],
      priority: 30,
    },
    setup: async (context) => {
      const config = context.requireService('kernel.config');
      const events = context.requireService('kernel.events');
      const broadcaster = context.requireService('kernel.broadcaster');
      const threads = context.requireService('threads.registry');
      const memory = context.getService('memory.store');

      const queue = new TaskQueue({
        store: context.requireService('kernel.stores').open('tasks', TaskDocumentSchema),
        logger: context.logger,
        onChange: (change) => events.publish('tasks:updated', change),
      });
      const recovery = await queue.load();
      if (recovery.requeued > 0 || recovery.interrupted > 0) {
        context.logger.info('Recovered tasks', { ...recovery });
      }

      const taskScheduler = new TaskScheduler({
        queue,
        threads,
        executor: options.executor ?? new LoopbackExecutor(context.logger),
        config: config.scheduler,
        logger: context.logger,
        shutdownGraceMs: options.shutdownGraceMs,
        onStep: (task, workerId, step) => {
          events.publish('tasks:step', { task_id: task.id, thread_id: task.thread_id, worker_id: workerId, step });
        },
      });
      scheduler = taskScheduler;

      context.registerService({
        id: 'tasks.queue',
        pluginId: PLUGIN_ID,
        description: 'Authoritative task store',
        implementation: queue,
      });
      context.registerService({
        id: 'tasks.scheduler',
        pluginId: PLUGIN_ID,
        description: 'Task submission and worker pool',
        implementation: taskScheduler,
      });

      unsubscribers.push(
        events.subscribe('tasks:updated', ({ payload }) => {
          const { task, previous } = payload;
          broadcaster.publish('chat', 'task_update', { task, previous });
          if (!isTerminal(task.status) || previous === task.status) return;

          broadcaster.publish('chat', 'response', {
            task_id: task.id,
            thread_id: task.thread_id,
            status: task.status,
            result: task.result,
            error: task.error,
          });

          if (task.status === 'completed' && task.result && memory) {
            const response = task.result.response;
            memory
              .append({
                scope: { thread_id: task.thread_id },
                event_type: 'task_completed',
                summary: response.slice(0, MEMORY_SUMMARY_LENGTH) || task.prompt.slice(0, MEMORY_SUMMARY_LENGTH),
                content: response,
                trace_id: task.id,
                details: { prompt: task.prompt, execution_time: task.result.execution_time },
              })
              .catch((error: unknown) => {
                context.logger.error('Failed to record task memory', { taskId: task.id, reason: errorMessage(error) });
              });
          }
        }),
        events.subscribe('tasks:step', ({ payload }) => {
          broadcaster.publish('chat', 'agent_step', payload);
        }),
        events.subscribe('threads:deleted', ({ payload }) => {
          taskScheduler.cancelThread(payload.thread.id);
        }),
      );

      context.registerHttpRoute({
        method: 'POST',
        path: '/api/tasks/submit',
        pluginId: PLUGIN_ID,
        description: 'Submit a prompt to a thread',
        handler: async (req, res) => {
          const input = await readInput(req, SubmitTaskInputSchema);
          const task = await taskScheduler.submit(input.thread_id, input.prompt);
          json(res, 202, { task_id: task.id, status: task.status });
        },
      });

      context.registerHttpRoute({
        method: 'GET',
        path: '/api/tasks/status/:id',
        pluginId: PLUGIN_ID,
        description: 'Current task record',
        handler: async (_req, res, ctx) => {
          json(res, 200, taskScheduler.status(ctx.params.id));
        },
      });

      context.registerHttpRoute({
        method: 'GET',
        path: '/api/tasks/queue/status',
        pluginId: PLUGIN_ID,
        description: 'Queue counters and per-thread status',
        handler: async (_req, res) => {
          json(res, 200, taskScheduler.queueStatus());
        },
      });

      context.registerHttpRoute({
        method: 'GET',
        path: '/api/threads/:id',
        pluginId: PLUGIN_ID,
        description: 'Thread with its tasks',
        handler: async (_req, res, ctx) => {
          const thread = threads.get(ctx.params.id);
          json(res, 200, { thread, tasks: queue.forThread(thread.id) });
        },
      });

      context.registerGatewayMethod({
        id: 'tasks.submit',
        pluginId: PLUGIN_ID,
        description: 'Submit a prompt to a thread',
        handler: async (params) => {
          const input = parseInput(SubmitTaskInputSchema, params);
          const task = await taskScheduler.submit(input.thread_id, input.prompt);
          return { task_id: task.id, status: task.status };
        },
      });

      context.registerGatewayMethod({
        id: 'tasks.status',
        pluginId: PLUGIN_ID,
        description: 'Current task record',
        handler: async (params) => taskScheduler.status(parseInput(TaskIdSchema, params).task_id),
      });

      context.registerGatewayMethod({
        id: 'tasks.queueStatus',
        pluginId: PLUGIN_ID,
        description: 'Queue counters and per-thread status',
        handler: async () => taskScheduler.queueStatus(),
      });

      context.registerGatewayMethod({
        id: 'tasks.complete',
        pluginId: PLUGIN_ID,
        description: 'Finalize a running task as completed',
        handler: async (params) => {
          const input = parseInput(CompleteTaskInputSchema, params);
          return taskScheduler.complete(input.task_id, input.result);
        },
      });

      context.registerGatewayMethod({
        id: 'tasks.fail',
        pluginId: PLUGIN_ID,
        description: 'Finalize a task as failed',
        handler: async (params) => {
          const input = parseInput(FailTaskInputSchema, params);
          return taskScheduler.fail(input.task_id, input.message);
        },
      });
    },
    activate: () => {
      scheduler?.start();
    },
    deactivate: async () => {
      await scheduler?.stop();
      for (const unsubscribe of unsubscribers.splice(0)) unsubscribe();
    },
  };
}
