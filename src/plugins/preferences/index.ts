import { z } from 'zod';
import type { TaskdeckPlugin } from '../../core/kernel/contracts.js';
import { json, parseInput, readInput } from '../../core/gateway/http.js';
import { JsonObjectSchema, JsonValueSchema } from '../../core/utils/json.js';
import { PreferenceDocumentSchema, PreferenceStore } from './preference-store.js';

declare module '../../core/kernel/contracts.js' {
  interface ServiceMap {
    'preferences.store': PreferenceStore;
  }
}

const PLUGIN_ID = 'taskdeck.preferences';

const SetPreferenceSchema = z.object({ value: JsonValueSchema });
const PreferenceKeySchema = z.object({ key: z.string().min(1) });

export function createPreferencesPlugin(): TaskdeckPlugin {
  return {
    manifest: {
      id: PLUGIN_ID,
      name: 'Preferences',
      version: '0.1.0',
      description: 'Durable UI and session preferences',
      priority: 10,
    },
    setup: async (context) => {
      const store = new PreferenceStore({
        store: context.requireService('kernel.stores').open('preferences', PreferenceDocumentSchema),
        logger: context.logger,
      });
      await store.load();

      context.registerService({
        id: 'preferences.store',
        pluginId: PLUGIN_ID,
        description: 'Preference store',
        implementation: store,
      });

      context.registerHttpRoute({
        method: 'GET',
        path: '/api/preferences',
        pluginId: PLUGIN_ID,
        description: 'All preferences',
        handler: async (_req, res) => {
          json(res, 200, store.getAll());
        },
      });

      context.registerHttpRoute({
        method: 'POST',
        path: '/api/preferences',
        pluginId: PLUGIN_ID,
        description: 'Merge top-level preferences',
        handler: async (req, res) => {
          json(res, 200, await store.update(await readInput(req, JsonObjectSchema)));
        },
      });

      context.registerHttpRoute({
        method: 'GET',
        path: '/api/preferences/:key',
        pluginId: PLUGIN_ID,
        description: 'One preference, dotted keys allowed',
        handler: async (_req, res, ctx) => {
          json(res, 200, { key: ctx.params.key, value: store.get(ctx.params.key) });
        },
      });

      context.registerHttpRoute({
        method: 'POST',
        path: '/api/preferences/:key',
        pluginId: PLUGIN_ID,
        description: 'Set one preference',
        handler: async (req, res, ctx) => {
          const { value } = await readInput(req, SetPreferenceSchema);
          json(res, 200, { key: ctx.params.key, value: await store.set(ctx.params.key, value) });
        },
      });

      context.registerGatewayMethod({
        id: 'preferences.get',
        pluginId: PLUGIN_ID,
        description: 'One preference',
        handler: async (params) => store.get(parseInput(PreferenceKeySchema, params).key),
      });

      context.registerGatewayMethod({
        id: 'preferences.set',
        pluginId: PLUGIN_ID,
        description: 'Set one preference',
        handler: async (params) => {
          const input = parseInput(PreferenceKeySchema.merge(SetPreferenceSchema), params);
          return store.set(input.key, input.value);
        },
      });
    },
  };
}
