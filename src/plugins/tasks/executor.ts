import type { StructuredLogger } from '../../core/kernel/contracts.js';
import { TaskdeckError } from '../../errors.js';
import type { TaskExecutionOutput, TaskExecutionRequest, TaskExecutor } from './types.js';

/**
 * Development executor that answers every prompt with the prompt itself.
 * Production deployments pass a model-backed executor to the tasks plugin.
 */
export class LoopbackExecutor implements TaskExecutor {
  constructor(logger?: StructuredLogger) {
    logger?.warn('No task executor configured; tasks are answered by the loopback executor');
  }

  async execute(request: TaskExecutionRequest): Promise<TaskExecutionOutput> {
    if (request.signal.aborted) {
      throw new TaskdeckError('Execution aborted', 'ABORTED');
    }
    request.onStep({ agent: 'loopback', kind: 'thinking', content: `Echoing prompt for ${request.thread.title}` });
    return {
      response: request.task.prompt,
      actions_taken: ['echo'],
    };
  }
}
