import { afterEach, describe, expect, test } from 'vitest';
import type { TaskdeckKernel } from '../src/core/kernel/kernel.js';
import { ControlledExecutor, createTestKernel, waitFor } from './helpers.js';

let kernel: TaskdeckKernel | null = null;

afterEach(async () => {
  await kernel?.stop();
  kernel = null;
});

describe('thread deletion', () => {
  test('cancels the running and queued tasks of the deleted thread', async () => {
    const executor = new ControlledExecutor();
    kernel = await createTestKernel({ tasks: { executor, shutdownGraceMs: 20 } });
    await kernel.start();
    const threads = kernel.services.require('threads.registry');
    const scheduler = kernel.services.require('tasks.scheduler');

    const thread = await threads.create('Doomed');
    const other = await threads.create('Survivor');
    const running = await scheduler.submit(thread.id, 'first');
    const queued = await scheduler.submit(thread.id, 'second');
    const elsewhere = await scheduler.submit(other.id, 'unrelated');
    await waitFor(() => executor.calls.length === 2);
    expect(scheduler.status(running.id).status).toBe('running');
    expect(scheduler.status(queued.id).status).toBe('queued');

    await threads.delete(thread.id);

    expect(scheduler.status(running.id)).toMatchObject({
      status: 'failed',
      error: { kind: 'Cancelled', message: 'thread deleted', attempts: 1 },
    });
    expect(scheduler.status(queued.id)).toMatchObject({
      status: 'failed',
      error: { kind: 'Cancelled', message: 'thread deleted', attempts: 0 },
    });
    expect(scheduler.status(elsewhere.id).status).toBe('running');
    expect(executor.calls.map((call) => call.request.task.id)).toEqual([running.id, elsewhere.id]);
  });
});
