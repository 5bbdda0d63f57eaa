/**
 * @module plugins/system
 *
 * Lightweight heartbeat read for clients: orchestrator readiness, active
 * agent count and tool count. Polled, never pushed, and open without a token.
 */
import type { TaskdeckPlugin } from '../../core/kernel/contracts.js';
import { json } from '../../core/gateway/http.js';

const PLUGIN_ID = 'taskdeck.system';

export interface SystemStatus {
  orchestrator_ready: boolean;
  active_agents: number;
  total_tools: number;
  pending_packages: number;
  queue: { queued: number; running: number };
  uptime_s: number;
  plugins: { loaded: number; failed: number };
  server_time: string;
}

export function createSystemPlugin(options: { startedAt?: Date } = {}): TaskdeckPlugin {
  const startedAt = options.startedAt ?? new Date();

  return {
    manifest: {
      id: PLUGIN_ID,
      name: 'System Status',
      version: '0.1.0',
      description: 'Readiness and counters for client heartbeats',
      priority: 90,
    },
    setup: (context) => {
      const diagnostics = context.requireService('kernel.diagnostics');

      const status = (): SystemStatus => {
        const scheduler = context.getService('tasks.scheduler');
        const queue = scheduler?.queueStatus();
        const plugins = diagnostics();
        const now = new Date();
        return {
          orchestrator_ready: scheduler?.isRunning ?? false,
          active_agents: context.getService('agents.roster')?.snapshot().active_count ?? 0,
          total_tools: context.getService('tools.catalog')?.count() ?? 0,
          pending_packages: context.getService('packages.manager')?.list('pending').length ?? 0,
          queue: { queued: queue?.queued_count ?? 0, running: queue?.running_count ?? 0 },
          uptime_s: Math.max(0, Math.floor((now.getTime() - startedAt.getTime()) / 1000)),
          plugins: {
            loaded: plugins.filter((plugin) => plugin.status === 'loaded').length,
            failed: plugins.filter((plugin) => plugin.status === 'failed').length,
          },
          server_time: now.toISOString(),
        };
      };

      context.registerHttpRoute({
        method: 'GET',
        path: '/api/system/status',
        pluginId: PLUGIN_ID,
        description: 'System heartbeat',
        public: true,
        handler: async (_req, res) => {
          json(res, 200, status());
        },
      });

      context.registerGatewayMethod({
        id: 'system.status',
        pluginId: PLUGIN_ID,
        description: 'System heartbeat',
        handler: async () => status(),
      });

      context.registerGatewayMethod({
        id: 'system.plugins',
        pluginId: PLUGIN_ID,
        description: 'Plugin load diagnostics',
        handler: async () => diagnostics(),
      });
    },
  };
}
