/**
 * @module plugins/tools
 *
 * Catalog of named, schema-described tools available to workers. System tools
 * are seeded from `data/system-tools.json` and cannot be deleted.
 */
import { z } from 'zod';
import type { TaskdeckPlugin } from '../../core/kernel/contracts.js';
import { json, parseInput, readInput } from '../../core/gateway/http.js';
import { ToolCatalog } from './tool-catalog.js';
import { RegisterToolInputSchema, ToolDocumentSchema } from './types.js';

declare module '../../core/kernel/contracts.js' {
  interface ServiceMap {
    'tools.catalog': ToolCatalog;
  }
}

const PLUGIN_ID = 'taskdeck.tools';

const ToolNameSchema = z.object({ name: z.string().min(1) });

export function createToolsPlugin(): TaskdeckPlugin {
  return {
    manifest: {
      id: PLUGIN_ID,
      name: 'Tool Catalog',
      version: '0.1.0',
      description: 'Registered tools with protected system tools',
      priority: 20,
    },
    setup: async (context) => {
      const catalog = new ToolCatalog({
        store: context.requireService('kernel.stores').open('tools', ToolDocumentSchema),
        events: context.requireService('kernel.events'),
        logger: context.logger,
      });
      await catalog.load();

      context.registerService({
        id: 'tools.catalog',
        pluginId: PLUGIN_ID,
        description: 'Tool catalog',
        implementation: catalog,
      });

      context.registerHttpRoute({
        method: 'GET',
        path: '/api/tools/list',
        pluginId: PLUGIN_ID,
        description: 'List tools, optionally filtered by ?domain=',
        handler: async (_req, res, ctx) => {
          const tools = catalog.list(ctx.query.get('domain') ?? undefined);
          json(res, 200, { tools, count: tools.length });
        },
      });

      context.registerHttpRoute({
        method: 'POST',
        path: '/api/tools',
        pluginId: PLUGIN_ID,
        description: 'Register a tool',
        handler: async (req, res) => {
          const input = await readInput(req, RegisterToolInputSchema);
          json(res, 201, { tool: await catalog.register(input) });
        },
      });

      context.registerHttpRoute({
        method: 'DELETE',
        path: '/api/tools/:name',
        pluginId: PLUGIN_ID,
        description: 'Delete a non-system tool',
        handler: async (_req, res, ctx) => {
          const tool = await catalog.delete(ctx.params.name);
          json(res, 200, { ok: true, name: tool.name });
        },
      });

      context.registerGatewayMethod({
        id: 'tools.list',
        pluginId: PLUGIN_ID,
        description: 'List tools',
        handler: async () => catalog.list(),
      });

      context.registerGatewayMethod({
        id: 'tools.delete',
        pluginId: PLUGIN_ID,
        description: 'Delete a non-system tool',
        handler: async (params) => catalog.delete(parseInput(ToolNameSchema, params).name),
      });
    },
  };
}
