/**
 * @module plugins/threads
 *
 * Thread Registry plugin. Owns thread metadata and publishes every change as
 * a `thread_update` envelope on the chat channel.
 *
 * Routes: GET/POST /api/threads, DELETE/PATCH /api/threads/:id,
 *         POST /api/threads/:id/mode, PATCH /api/threads/:id/settings
 * RPC:    threads.list, threads.create, threads.get, threads.delete,
 *         threads.setMode, threads.updateSettings
 */
import { z } from 'zod';
import type { TaskdeckPlugin } from '../../core/kernel/contracts.js';
import { json, parseInput, readInput } from '../../core/gateway/http.js';
import { ThreadRegistry } from './thread-registry.js';
import {
  CreateThreadInputSchema,
  SetModeInputSchema,
  ThreadDocumentSchema,
  ThreadSettingsPatchSchema,
  type Thread,
  type ThreadChange
} from './types.js';

declare module '../../core/kernel/contracts.js' {
  interface ServiceMap {
    'threads.registry': ThreadRegistry;
  }
}

const PLUGIN_ID = 'taskdeck.threads';

const ThreadIdSchema = z.object({ thread_id: z.string().min(1) });
const RenameInputSchema = z.object({ title: z.string().trim().min(1).max(200) });

export function createThreadsPlugin(): TaskdeckPlugin {
  let registry: ThreadRegistry;

  return {
    manifest: {
      id: PLUGIN_ID,
      name: 'Thread Registry',
      version: '0.1.0',
      description: 'Conversation threads, their mode and settings',
      priority: 10,
    },
    setup: async (context) => {
      const events = context.requireService('kernel.events');
      const broadcaster = context.requireService('kernel.broadcaster');
      const stores = context.requireService('kernel.stores');

      registry = new ThreadRegistry({
        store: stores.open('threads', ThreadDocumentSchema),
        events,
        logger: context.logger,
      });
      await registry.load();

      context.registerService({
        id: 'threads.registry',
        pluginId: PLUGIN_ID,
        description: 'Thread registry',
        implementation: registry,
      });

      const forward = (action: ThreadChange) => (event: { payload: { thread: Thread } }) => {
        broadcaster.publish('chat', 'thread_update', { action, thread: event.payload.thread });
      };
      events.subscribe('threads:created', forward('created'));
      events.subscribe('threads:updated', forward('updated'));
      events.subscribe('threads:deleted', forward('deleted'));

      context.registerHttpRoute({
        method: 'GET',
        path: '/api/threads',
        pluginId: PLUGIN_ID,
        description: 'List threads, most recently updated first',
        handler: async (_req, res) => {
          json(res, 200, { threads: registry.list() });
        },
      });

      context.registerHttpRoute({
        method: 'POST',
        path: '/api/threads',
        pluginId: PLUGIN_ID,
        description: 'Create a thread',
        handler: async (req, res) => {
          const input = await readInput(req, CreateThreadInputSchema);
          json(res, 201, { thread: await registry.create(input.title) });
        },
      });

      context.registerHttpRoute({
        method: 'PATCH',
        path: '/api/threads/:id',
        pluginId: PLUGIN_ID,
        description: 'Rename a thread',
        handler: async (req, res, ctx) => {
          const input = await readInput(req, RenameInputSchema);
          json(res, 200, { thread: await registry.rename(ctx.params.id, input.title) });
        },
      });

      context.registerHttpRoute({
        method: 'DELETE',
        path: '/api/threads/:id',
        pluginId: PLUGIN_ID,
        description: 'Delete a thread and cancel its outstanding tasks',
        handler: async (_req, res, ctx) => {
          const thread = await registry.delete(ctx.params.id);
          json(res, 200, { ok: true, thread_id: thread.id });
        },
      });

      context.registerHttpRoute({
        method: 'POST',
        path: '/api/threads/:id/mode',
        pluginId: PLUGIN_ID,
        description: 'Set thread mode',
        handler: async (req, res, ctx) => {
          const input = await readInput(req, SetModeInputSchema);
          json(res, 200, { thread: await registry.setMode(ctx.params.id, input.mode) });
        },
      });

      context.registerHttpRoute({
        method: 'PATCH',
        path: '/api/threads/:id/settings',
        pluginId: PLUGIN_ID,
        description: 'Merge thread settings',
        handler: async (req, res, ctx) => {
          const patch = await readInput(req, ThreadSettingsPatchSchema);
          json(res, 200, { thread: await registry.updateSettings(ctx.params.id, patch) });
        },
      });

      context.registerGatewayMethod({
        id: 'threads.list',
        pluginId: PLUGIN_ID,
        description: 'List threads',
        handler: async () => registry.list(),
      });

      context.registerGatewayMethod({
        id: 'threads.create',
        pluginId: PLUGIN_ID,
        description: 'Create a thread',
        handler: async (params) => {
          const input = parseInput(CreateThreadInputSchema, params ?? {});
          return registry.create(input.title);
        },
      });

      context.registerGatewayMethod({
        id: 'threads.get',
        pluginId: PLUGIN_ID,
        description: 'Get a thread',
        handler: async (params) => registry.get(parseInput(ThreadIdSchema, params).thread_id),
      });

      context.registerGatewayMethod({
        id: 'threads.delete',
        pluginId: PLUGIN_ID,
        description: 'Delete a thread',
        handler: async (params) => registry.delete(parseInput(ThreadIdSchema, params).thread_id),
      });

      context.registerGatewayMethod({
        id: 'threads.setMode',
        pluginId: PLUGIN_ID,
        description: 'Set thread mode',
        handler: async (params) => {
          const input = parseInput(ThreadIdSchema.merge(SetModeInputSchema), params);
          return registry.setMode(input.thread_id, input.mode);
        },
      });

      context.registerGatewayMethod({
        id: 'threads.updateSettings',
        pluginId: PLUGIN_ID,
        description: 'Merge thread settings',
        handler: async (params) => {
          const input = parseInput(ThreadIdSchema.extend({ settings: ThreadSettingsPatchSchema }), params);
          return registry.updateSettings(input.thread_id, input.settings);
        },
      });
    },
  };
}
