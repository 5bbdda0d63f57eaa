/**
 * @module kernel-boot
 *
 * Boot logic split out of the kernel: dependency ordering of plugins,
 * per-plugin registration contexts, and failure-isolated setup.
 */
import type {
  PluginDiagnostic,
  PluginManifest,
  PluginRegistrationContext,
  StructuredLogger,
  TaskdeckPlugin
} from './contracts.js';
import type { GatewayMethodRegistry, HttpRouteRegistry, ServiceRegistry } from './registries.js';
import { errorMessage } from '../../errors.js';

// ---------------------------------------------------------------------------
// Plugin ownership guard
// ---------------------------------------------------------------------------

function assertPluginOwnership(
  actualId: string,
  expectedId: string,
  contributionKind: string,
  contributionId: string
): void {
  if (actualId !== expectedId) {
    throw new Error(
      `${contributionKind} ${contributionId} declares pluginId=${actualId} but current plugin context is ${expectedId}`
    );
  }
}

// ---------------------------------------------------------------------------
// Topological sort
// ---------------------------------------------------------------------------

function byPriority(a: { manifest: PluginManifest }, b: { manifest: PluginManifest }): number {
  const aPriority = a.manifest.priority ?? 100;
  const bPriority = b.manifest.priority ?? 100;
  if (aPriority !== bPriority) {
    return aPriority - bPriority;
  }
  return a.manifest.id.localeCompare(b.manifest.id);
}

/**
 * Orders plugins so each comes after its dependencies; ties break on
 * `priority` (lower first, default 100), then id. Dependencies on plugins
 * that are not present are ignored here and caught by `requireService`.
 */
export function sortPlugins<T extends { manifest: PluginManifest }>(plugins: T[]): T[] {
  const byId = new Map(plugins.map((item) => [item.manifest.id, item]));
  const indegree = new Map<string, number>();
  const edges = new Map<string, string[]>();

  for (const plugin of plugins) {
    indegree.set(plugin.manifest.id, 0);
    edges.set(plugin.manifest.id, []);
  }

  for (const plugin of plugins) {
    for (const dependency of plugin.manifest.dependencies ?? []) {
      const dependents = edges.get(dependency);
      if (!dependents) {
        continue;
      }
      indegree.set(plugin.manifest.id, (indegree.get(plugin.manifest.id) ?? 0) + 1);
      dependents.push(plugin.manifest.id);
    }
  }

  const queue = plugins.filter((item) => (indegree.get(item.manifest.id) ?? 0) === 0).sort(byPriority);
  const result: T[] = [];

  for (let next = queue.shift(); next; next = queue.shift()) {
    result.push(next);

    for (const dependentId of edges.get(next.manifest.id) ?? []) {
      const remaining = (indegree.get(dependentId) ?? 0) - 1;
      indegree.set(dependentId, remaining);
      const dependent = byId.get(dependentId);
      if (remaining === 0 && dependent) {
        queue.push(dependent);
        queue.sort(byPriority);
      }
    }
  }

  if (result.length !== plugins.length) {
    const unresolved = plugins
      .filter((plugin) => !result.includes(plugin))
      .map((plugin) => plugin.manifest.id)
      .sort();
    throw new Error(`Plugin dependency cycle detected among: ${unresolved.join(', ')}`);
  }

  return result;
}

// ---------------------------------------------------------------------------
// Plugin registration context factory
// ---------------------------------------------------------------------------

/** Kernel registries a registration context writes into. */
export interface RegistrationContextDeps {
  gatewayMethods: GatewayMethodRegistry;
  httpRoutes: HttpRouteRegistry;
  services: ServiceRegistry;
  logger: StructuredLogger;
}

export function createPluginRegistrationContext(
  pluginId: string,
  deps: RegistrationContextDeps
): PluginRegistrationContext {
  return {
    registerGatewayMethod: (method) => {
      assertPluginOwnership(method.pluginId, pluginId, 'Gateway method', method.id);
      deps.gatewayMethods.register(method);
    },
    registerHttpRoute: (route) => {
      assertPluginOwnership(route.pluginId, pluginId, 'HTTP route', `${route.method}:${route.path}`);
      deps.httpRoutes.register(route);
    },
    registerService: (service) => {
      assertPluginOwnership(service.pluginId, pluginId, 'Service', service.id);
      deps.services.register(service);
    },
    getService: (serviceId) => deps.services.get(serviceId),
    requireService: (serviceId) => deps.services.require(serviceId),
    logger: deps.logger
  };
}

// ---------------------------------------------------------------------------
// Failure-isolated setup
// ---------------------------------------------------------------------------

/**
 * Runs `setup`; a throwing plugin is reported as failed instead of aborting
 * the boot. Anything it registered before throwing stays registered.
 */
export async function setupPluginSafely(
  plugin: TaskdeckPlugin,
  context: PluginRegistrationContext,
  logger: StructuredLogger
): Promise<PluginDiagnostic> {
  try {
    await plugin.setup(context);
    return { pluginId: plugin.manifest.id, status: 'loaded' };
  } catch (error) {
    const reason = errorMessage(error);
    logger.error('Plugin registration failed', { pluginId: plugin.manifest.id, reason });
    return { pluginId: plugin.manifest.id, status: 'failed', reason };
  }
}
