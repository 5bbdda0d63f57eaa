/**
 * @module plugins/packages
 *
 * Package Approval Manager plugin. Installation always needs an explicit
 * approve followed by an asynchronous install step; every transition is
 * published as `package_update`, and install outcomes additionally as
 * `package_installed` / `package_failed`, on the chat channel.
 */
import { z } from 'zod';
import type { TaskdeckPlugin } from '../../core/kernel/contracts.js';
import { json, parseInput, readInput } from '../../core/gateway/http.js';
import { PackageApprovalManager } from './approval-manager.js';
import { PackageInstallWorker } from './install-worker.js';
import { NpmPackageInstaller } from './npm-installer.js';
import { NpmRegistryIndex } from './package-index.js';
import {
  ListPackagesInputSchema,
  PackageDocumentSchema,
  RequestInstallInputSchema,
  type PackageIndex,
  type PackageInstaller
} from './types.js';

declare module '../../core/kernel/contracts.js' {
  interface ServiceMap {
    'packages.manager': PackageApprovalManager;
    'packages.worker': PackageInstallWorker;
  }
}

const PLUGIN_ID = 'taskdeck.packages';

const PackageNameSchema = z.object({ package_name: z.string().min(1) });

export interface PackagesPluginOptions {
  installer?: PackageInstaller;
  index?: PackageIndex;
}

type NameAction = 'approve' | 'deny' | 'uninstall' | 'retry';
const NAME_ACTIONS: readonly NameAction[] = ['approve', 'deny', 'uninstall', 'retry'];

export function createPackagesPlugin(options: PackagesPluginOptions = {}): TaskdeckPlugin {
  let worker: PackageInstallWorker | undefined;
  const unsubscribers: Array<() => void> = [];

  return {
    manifest: {
      id: PLUGIN_ID,
      name: 'Package Approval',
      version: '0.1.0',
      description: 'Human-gated dependency installation',
      priority: 40,
    },
    setup: async (context) => {
      const config = context.requireService('kernel.config');
      const events = context.requireService('kernel.events');
      const broadcaster = context.requireService('kernel.broadcaster');

      const installer = options.installer ?? new NpmPackageInstaller({
        installDir: config.packages.installDir,
        timeoutMs: config.packages.installTimeoutMs,
        logger: context.logger,
      });
      const index = options.index ?? new NpmRegistryIndex({
        registryUrl: config.packages.registryUrl,
        downloadsUrl: config.packages.downloadsUrl,
        timeoutMs: config.packages.lookupTimeoutMs,
        logger: context.logger,
      });

      const manager = new PackageApprovalManager({
        store: context.requireService('kernel.stores').open('packages', PackageDocumentSchema),
        index,
        installer,
        events,
        logger: context.logger,
      });
      await manager.load();

      const installWorker = new PackageInstallWorker({
        manager,
        installer,
        timeoutMs: config.packages.installTimeoutMs,
        logger: context.logger,
      });
      worker = installWorker;

      context.registerService({
        id: 'packages.manager',
        pluginId: PLUGIN_ID,
        description: 'Package approval state machine',
        implementation: manager,
      });
      context.registerService({
        id: 'packages.worker',
        pluginId: PLUGIN_ID,
        description: 'Sequential package installer',
        implementation: installWorker,
      });

      unsubscribers.push(
        events.subscribe('packages:updated', ({ payload }) => {
          const record = payload.package;
          broadcaster.publish('chat', 'package_update', { package: record, previous: payload.previous });
          if (record.status === 'approved') {
            installWorker.enqueue(record.package_name);
          } else if (record.status === 'installed' && payload.previous === 'approved') {
            broadcaster.publish('chat', 'package_installed', {
              package_name: record.package_name,
              version: record.installed_version,
            });
          } else if (record.status === 'failed') {
            broadcaster.publish('chat', 'package_failed', {
              package_name: record.package_name,
              error: record.last_error,
            });
          }
        }),
      );

      context.registerHttpRoute({
        method: 'GET',
        path: '/api/packages/all',
        pluginId: PLUGIN_ID,
        description: 'List package records, optionally filtered by ?status=',
        handler: async (_req, res, ctx) => {
          const { status } = parseInput(ListPackagesInputSchema, {
            status: ctx.query.get('status') ?? undefined,
          });
          const packages = manager.list(status);
          json(res, 200, { packages, count: packages.length });
        },
      });

      context.registerHttpRoute({
        method: 'POST',
        path: '/api/packages/request',
        pluginId: PLUGIN_ID,
        description: 'Request installation of a package',
        handler: async (req, res) => {
          const input = await readInput(req, RequestInstallInputSchema);
          json(res, 200, { package: await manager.requestInstall(input) });
        },
      });

      for (const action of NAME_ACTIONS) {
        context.registerHttpRoute({
          method: 'POST',
          path: `/api/packages/${action}/:name`,
          pluginId: PLUGIN_ID,
          description: `${action} a package`,
          handler: async (_req, res, ctx) => {
            json(res, 200, { package: await manager[action](ctx.params.name) });
          },
        });
      }

      context.registerHttpRoute({
        method: 'POST',
        path: '/api/packages/sync',
        pluginId: PLUGIN_ID,
        description: 'Reconcile records with the installed environment',
        handler: async (_req, res) => {
          json(res, 200, await manager.sync());
        },
      });

      context.registerHttpRoute({
        method: 'GET',
        path: '/api/packages/info/:name',
        pluginId: PLUGIN_ID,
        description: 'Live package index lookup',
        handler: async (_req, res, ctx) => {
          json(res, 200, { package_name: ctx.params.name, ...(await manager.info(ctx.params.name)) });
        },
      });

      context.registerGatewayMethod({
        id: 'packages.list',
        pluginId: PLUGIN_ID,
        description: 'List package records',
        handler: async (params) => manager.list(parseInput(ListPackagesInputSchema, params ?? {}).status),
      });

      context.registerGatewayMethod({
        id: 'packages.request',
        pluginId: PLUGIN_ID,
        description: 'Request installation of a package',
        handler: async (params) => manager.requestInstall(parseInput(RequestInstallInputSchema, params)),
      });

      for (const action of NAME_ACTIONS) {
        context.registerGatewayMethod({
          id: `packages.${action}`,
          pluginId: PLUGIN_ID,
          description: `${action} a package`,
          handler: async (params) => manager[action](parseInput(PackageNameSchema, params).package_name),
        });
      }

      context.registerGatewayMethod({
        id: 'packages.sync',
        pluginId: PLUGIN_ID,
        description: 'Reconcile records with the installed environment',
        handler: async () => manager.sync(),
      });
    },
    activate: () => {
      // Picks up packages approved before the last shutdown and never reported.
      worker?.sweep();
    },
    deactivate: async () => {
      for (const unsubscribe of unsubscribers.splice(0)) unsubscribe();
      await worker?.stop();
    },
  };
}
