/**
 * @module plugins/agents
 *
 * Live agent roster. Running tasks and active conversations appear as
 * entries; every change, and a periodic tick, pushes `agents_update` on the
 * agents channel.
 */
import type { TaskdeckPlugin } from '../../core/kernel/contracts.js';
import { json } from '../../core/gateway/http.js';
import { AgentRoster } from './agent-roster.js';

declare module '../../core/kernel/contracts.js' {
  interface ServiceMap {
    'agents.roster': AgentRoster;
  }
}

const PLUGIN_ID = 'taskdeck.agents';

export function createAgentsPlugin(): TaskdeckPlugin {
  let roster: AgentRoster | undefined;
  let ticker: NodeJS.Timeout | null = null;
  let intervalMs = 0;
  let push: () => void = () => undefined;
  const unsubscribers: Array<() => void> = [];

  return {
    manifest: {
      id: PLUGIN_ID,
      name: 'Agent Roster',
      version: '0.1.0',
      description: 'In-flight worker and conversation activity',
      priority: 60,
    },
    setup: (context) => {
      const events = context.requireService('kernel.events');
      const broadcaster = context.requireService('kernel.broadcaster');
      intervalMs = context.requireService('kernel.config').broadcaster.agentsIntervalMs;

      const agents = new AgentRoster();
      roster = agents;
      push = () => {
        broadcaster.publish('agents', 'agents_update', agents.snapshot());
      };

      context.registerService({
        id: 'agents.roster',
        pluginId: PLUGIN_ID,
        description: 'Live agent roster',
        implementation: agents,
      });

      unsubscribers.push(
        agents.onChange((snapshot) => broadcaster.publish('agents', 'agents_update', snapshot)),
        events.subscribe('tasks:updated', ({ payload }) => {
          const { task } = payload;
          if (task.status === 'running' && task.worker_id) {
            agents.upsert({
              agent_id: task.worker_id,
              kind: 'worker',
              task_id: task.id,
              thread_id: task.thread_id,
              status: 'running',
              started_at: task.started_at ?? new Date().toISOString(),
            });
          } else if (task.status === 'completed' || task.status === 'failed') {
            agents.removeTask(task.id);
          }
        }),
        events.subscribe('tasks:step', ({ payload }) => {
          agents.recordStep(payload.worker_id, payload.step.content);
        }),
        events.subscribe('conversations:updated', ({ payload }) => {
          const { conversation } = payload;
          const agentId = `conversation:${conversation.id}`;
          if (conversation.status === 'running' || conversation.status === 'paused') {
            const last = conversation.transcript[conversation.transcript.length - 1];
            agents.upsert({
              agent_id: agentId,
              kind: 'conversation',
              task_id: null,
              thread_id: conversation.thread_id,
              status: conversation.status,
              started_at: conversation.created_at,
              ...(last?.speaker ? { last_step: `${last.speaker}: ${last.content}` } : {}),
            });
          } else {
            agents.remove(agentId);
          }
        }),
      );

      context.registerHttpRoute({
        method: 'GET',
        path: '/api/agents',
        pluginId: PLUGIN_ID,
        description: 'Current agent roster',
        handler: async (_req, res) => {
          json(res, 200, agents.snapshot());
        },
      });

      context.registerGatewayMethod({
        id: 'agents.list',
        pluginId: PLUGIN_ID,
        description: 'Current agent roster',
        handler: async () => agents.snapshot(),
      });
    },
    activate: () => {
      if (!roster || intervalMs <= 0) return;
      ticker = setInterval(push, intervalMs);
      ticker.unref();
    },
    deactivate: () => {
      if (ticker) {
        clearInterval(ticker);
        ticker = null;
      }
      for (const unsubscribe of unsubscribers.splice(0)) unsubscribe();
    },
  };
}
