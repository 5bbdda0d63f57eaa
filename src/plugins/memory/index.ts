import type { TaskdeckPlugin } from '../../core/kernel/contracts.js';
import { json, parseInput, readInput } from '../../core/gateway/http.js';
import { MemoryStore } from './memory-store.js';
import { AppendMemoryInputSchema, MemoryDocumentSchema, MemorySearchInputSchema } from './types.js';

declare module '../../core/kernel/contracts.js' {
  interface ServiceMap {
    'memory.store': MemoryStore;
  }
}

const PLUGIN_ID = 'taskdeck.memory';

/**
 * Memory plugin: append-only records, scoped to a thread or to the permanent
 * store, with an overview grouped by live thread and a lexical search.
 *
 * Routes:
 *  - `GET /api/memory/overview`
 *  - `POST /api/memory/search` `{ query, domain?, limit? }`
 *
 * Services:
 *  - `memory.store`: MemoryStore instance, used by the scheduler to record completions.
 */
export function createMemoryPlugin(): TaskdeckPlugin {
  return {
    manifest: {
      id: PLUGIN_ID,
      name: 'Memory',
      version: '0.1.0',
      description: 'Thread and permanent memory records with overview and search',
      dependencies: ['taskdeck.threads'],
      priority: 20,
    },
    setup: async (context) => {
      const stores = context.requireService('kernel.stores');
      const threads = context.requireService('threads.registry');
      const store = new MemoryStore({
        store: stores.open('memory', MemoryDocumentSchema),
        logger: context.logger,
        liveThreads: () => threads.list(),
      });
      await store.load();

      context.registerService({
        id: 'memory.store',
        pluginId: PLUGIN_ID,
        description: 'Memory record store',
        implementation: store,
      });

      context.registerHttpRoute({
        method: 'GET',
        path: '/api/memory/overview',
        pluginId: PLUGIN_ID,
        description: 'Permanent memory and per-thread memories',
        handler: async (_req, res) => {
          json(res, 200, store.overview());
        },
      });

      context.registerHttpRoute({
        method: 'POST',
        path: '/api/memory/search',
        pluginId: PLUGIN_ID,
        description: 'Lexical search over memory records',
        handler: async (req, res) => {
          const input = await readInput(req, MemorySearchInputSchema);
          const results = store.search(input.query, { domain: input.domain, limit: input.limit });
          json(res, 200, { query: input.query, count: results.length, results });
        },
      });

      context.registerGatewayMethod({
        id: 'memory.search',
        pluginId: PLUGIN_ID,
        description: 'Lexical search over memory records',
        handler: async (params) => {
          const input = parseInput(MemorySearchInputSchema, params);
          return store.search(input.query, { domain: input.domain, limit: input.limit });
        },
      });

      context.registerGatewayMethod({
        id: 'memory.append',
        pluginId: PLUGIN_ID,
        description: 'Append a memory record',
        handler: async (params) => store.append(parseInput(AppendMemoryInputSchema, params)),
      });
    },
  };
}
