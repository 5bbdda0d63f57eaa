/**
 * @module kernel
 *
 * Core orchestrator for taskdeck. Owns the registries, the event bus, the
 * broadcaster and the document stores, boots plugins in dependency order and
 * runs the gateway on top of what they registered.
 *
 * @see {@link TaskdeckKernel} - Main kernel class
 * @see {@link KernelCreateOptions} - Options for kernel instantiation
 */
import type {
  HealthStatus,
  JsonValue,
  PluginDiagnostic,
  RuntimeConfig,
  RuntimeFlags,
  TaskdeckPlugin
} from './contracts.js';
import { EventBus } from './event-bus.js';
import { GatewayMethodRegistry, HttpRouteRegistry, ServiceRegistry } from './registries.js';
import { createLogger, type KernelLogger, type LogEntry } from './logger.js';
import { createPluginRegistrationContext, setupPluginSafely, sortPlugins } from './kernel-boot.js';
import { loadRuntimeConfig } from '../config/runtime-config.js';
import { EventBroadcaster } from '../gateway/broadcaster.js';
import { TaskdeckGateway } from '../gateway/server.js';
import { createStoreFactory, type StoreFactory } from '../store/json-store.js';
import { errorMessage } from '../../errors.js';

/** Options for {@link TaskdeckKernel.create}. */
export interface KernelCreateOptions {
  /** Root directory of the current workspace. */
  workspaceRoot: string;
  flags?: RuntimeFlags;
  /** Skips config loading; used by tests and embedders. */
  config?: RuntimeConfig;
  plugins: TaskdeckPlugin[];
  logger?: KernelLogger;
}

export interface LogEnvelopePayload {
  level: LogEntry['level'];
  message: string;
  source?: string;
  fields?: Record<string, JsonValue>;
}

function toLogPayload(entry: LogEntry): LogEnvelopePayload {
  const source = entry.fields?.source;
  return {
    level: entry.level,
    message: entry.message,
    ...(typeof source === 'string' ? { source } : {}),
    ...(entry.fields ? { fields: entry.fields } : {})
  };
}

export class TaskdeckKernel {
  readonly logger: KernelLogger;
  readonly gatewayMethods = new GatewayMethodRegistry();
  readonly httpRoutes = new HttpRouteRegistry();
  readonly services = new ServiceRegistry();
  readonly events = new EventBus();
  readonly broadcaster: EventBroadcaster;
  readonly stores: StoreFactory;

  private readonly loadedPlugins: TaskdeckPlugin[] = [];
  private readonly diagnostics: PluginDiagnostic[] = [];
  private readonly unsubscribers: Array<() => void> = [];
  private gateway?: TaskdeckGateway;
  private started = false;

  private constructor(
    readonly workspaceRoot: string,
    readonly config: RuntimeConfig,
    logger?: KernelLogger
  ) {
    this.logger = logger ?? createLogger(config.logging.level);
    const kernelLog = this.logger.child('kernel');
    this.broadcaster = new EventBroadcaster(this.logger.child('broadcaster'));
    this.stores = createStoreFactory(config.storage.dir, this.logger.child('store'));

    // Entries logged while forwarding (e.g. a dropped send) are not forwarded again.
    let forwarding = false;
    this.unsubscribers.push(
      this.logger.subscribe((entry) => {
        if (forwarding) return;
        forwarding = true;
        try {
          this.broadcaster.publish('logs', 'log', toLogPayload(entry));
        } finally {
          forwarding = false;
        }
      })
    );

    this.services.register({
      id: 'kernel.config',
      pluginId: 'kernel',
      description: 'Runtime config accessor',
      implementation: this.config
    });
    this.services.register({
      id: 'kernel.logger',
      pluginId: 'kernel',
      description: 'Logger accessor',
      implementation: kernelLog
    });
    this.services.register({
      id: 'kernel.events',
      pluginId: 'kernel',
      description: 'Event bus for pub-sub',
      implementation: this.events
    });
    this.services.register({
      id: 'kernel.broadcaster',
      pluginId: 'kernel',
      description: 'Channel fan-out to connected observers',
      implementation: this.broadcaster
    });
    this.services.register({
      id: 'kernel.stores',
      pluginId: 'kernel',
      description: 'Per-collection document stores',
      implementation: this.stores
    });
    this.services.register({
      id: 'kernel.workspaceRoot',
      pluginId: 'kernel',
      description: 'Workspace root path',
      implementation: this.workspaceRoot
    });
    this.services.register({
      id: 'kernel.health',
      pluginId: 'kernel',
      description: 'Kernel health accessor',
      implementation: () => this.health()
    });
    this.services.register({
      id: 'kernel.diagnostics',
      pluginId: 'kernel',
      description: 'Kernel plugin diagnostics accessor',
      implementation: () => this.diagnosticsReport()
    });
  }

  /**
   * Loads the runtime config (unless given) and runs every plugin's `setup`
   * in dependency order. A plugin whose setup throws is recorded as failed
   * and the boot goes on without it.
   *
   * @throws ConfigError when the configuration is invalid.
   */
  static async create(options: KernelCreateOptions): Promise<TaskdeckKernel> {
    const config = options.config ?? await loadRuntimeConfig(options.workspaceRoot, options.flags);
    const kernel = new TaskdeckKernel(options.workspaceRoot, config, options.logger);

    for (const plugin of sortPlugins(options.plugins)) {
      const pluginId = plugin.manifest.id;
      const diagnostic = await setupPluginSafely(
        plugin,
        createPluginRegistrationContext(pluginId, {
          gatewayMethods: kernel.gatewayMethods,
          httpRoutes: kernel.httpRoutes,
          services: kernel.services,
          logger: kernel.logger.child(pluginId)
        }),
        kernel.logger
      );
      if (diagnostic.status === 'loaded') {
        kernel.loadedPlugins.push(plugin);
      }
      kernel.diagnostics.push(diagnostic);
    }

    return kernel;
  }

  /** Activates loaded plugins, in boot order. */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;

    for (const plugin of this.loadedPlugins) {
      try {
        await plugin.activate?.();
      } catch (error) {
        const reason = errorMessage(error);
        this.logger.error('Plugin activation failed', { pluginId: plugin.manifest.id, reason });
        this.markFailed(plugin.manifest.id, reason);
      }
    }

    this.events.publish('kernel:started', { plugins: this.loadedPlugins.length });
    this.logger.info('Kernel started', {
      plugins: this.loadedPlugins.length,
      failed: this.diagnostics.filter((item) => item.status === 'failed').length
    });
  }

  /** Binds the HTTP/WebSocket gateway; returns the port it listens on. */
  async startGateway(): Promise<number> {
    if (this.gateway) {
      return this.gateway.port;
    }

    this.gateway = new TaskdeckGateway({
      config: this.config,
      methods: this.gatewayMethods,
      routes: this.httpRoutes,
      broadcaster: this.broadcaster,
      logger: this.logger.child('gateway'),
      healthProvider: () => this.health(),
      submitChat: async (threadId, prompt) => {
        const task = await this.services.require('tasks.scheduler').submit(threadId, prompt);
        return { task_id: task.id, status: task.status };
      }
    });

    await this.gateway.start();
    return this.gateway.port;
  }

  async stopGateway(): Promise<void> {
    if (!this.gateway) {
      return;
    }
    await this.gateway.stop();
    this.gateway = undefined;
  }

  /**
   * Stops the gateway, deactivates plugins in reverse boot order and
   * flushes every store.
   */
  async stop(): Promise<void> {
    this.events.publish('kernel:stopping', {});
    await this.stopGateway();

    for (const plugin of [...this.loadedPlugins].reverse()) {
      try {
        await plugin.deactivate?.();
      } catch (error) {
        this.logger.warn('Plugin deactivation failed', {
          pluginId: plugin.manifest.id,
          reason: errorMessage(error)
        });
      }
    }

    await this.stores.flushAll();
    this.logger.info('Kernel stopped');
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
    this.broadcaster.clear();
    this.started = false;
  }

  diagnosticsReport(): PluginDiagnostic[] {
    return this.diagnostics.map((item) => ({ ...item }));
  }

  /** Degraded when any plugin failed to load or activate. */
  health(): HealthStatus {
    const failed = this.diagnostics.filter((item) => item.status === 'failed').length;
    return {
      status: failed > 0 ? 'degraded' : 'ok',
      details: {
        pluginsLoaded: this.diagnostics.filter((item) => item.status === 'loaded').length,
        pluginsFailed: failed,
        gatewayMethodCount: this.gatewayMethods.list().length,
        httpRouteCount: this.httpRoutes.list().length,
        subscribers: this.broadcaster.subscriberCount()
      }
    };
  }

  listLoadedPlugins(): string[] {
    return this.loadedPlugins.map((plugin) => plugin.manifest.id);
  }

  private markFailed(pluginId: string, reason: string): void {
    const diagnostic = this.diagnostics.find((item) => item.pluginId === pluginId);
    if (diagnostic) {
      diagnostic.status = 'failed';
      diagnostic.reason = reason;
    }
  }
}
