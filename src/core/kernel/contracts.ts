import type { IncomingMessage, ServerResponse } from 'node:http';
import type { EventBus } from './event-bus.js';
import type { EventBroadcaster } from '../gateway/broadcaster.js';
import type { StoreFactory } from '../store/json-store.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface StructuredLogger {
  debug(message: string, fields?: Record<string, JsonValue>): void;
  info(message: string, fields?: Record<string, JsonValue>): void;
  warn(message: string, fields?: Record<string, JsonValue>): void;
  error(message: string, fields?: Record<string, JsonValue>): void;
}

export interface RuntimeConfig {
  gateway: {
    host: string;
    port: number;
    authToken: string;
  };
  scheduler: {
    maxConcurrentTasks: number;
    taskTimeoutMs: number;
    maxAttempts: number;
    retryBackoffMs: number;
    implicitThreads: boolean;
  };
  packages: {
    installTimeoutMs: number;
    registryUrl: string;
    downloadsUrl: string;
    lookupTimeoutMs: number;
    installDir: string;
  };
  broadcaster: {
    agentsIntervalMs: number;
    heartbeatMs: number;
  };
  storage: {
    dir: string | null;
  };
  logging: {
    level: LogLevel;
  };
}

export interface RuntimeFlags {
  configPath?: string;
  gatewayHost?: string;
  gatewayPort?: number;
  gatewayToken?: string;
}

export interface HealthStatus {
  status: 'ok' | 'degraded' | 'error';
  details?: Record<string, JsonValue>;
}

export interface GatewayCallContext {
  requestId: string;
  authToken: string;
}

export interface GatewayRequest {
  method: string;
  params: JsonValue;
  requestId: string;
}

export interface GatewayError {
  code: string;
  message: string;
}

export type GatewayResponse =
  | { requestId: string; ok: true; result: unknown }
  | { requestId: string; ok: false; error: GatewayError };

export interface GatewayMethodDefinition {
  id: string;
  pluginId: string;
  description: string;
  handler: (params: JsonValue, context: GatewayCallContext) => Promise<unknown>;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface HttpRouteContext extends GatewayCallContext {
  /** Values bound by `:name` segments of the route path. */
  params: Record<string, string>;
  query: URLSearchParams;
}

export interface HttpRouteDefinition {
  method: HttpMethod;
  /** Path pattern; `:name` segments bind into {@link HttpRouteContext.params}. */
  path: string;
  pluginId: string;
  description: string;
  /** Skip the bearer-token check for this route. */
  public?: boolean;
  handler: (req: IncomingMessage, res: ServerResponse, context: HttpRouteContext) => Promise<void>;
}

/**
 * Typed service lookup. Plugins extend this map via declaration merging:
 *
 * ```ts
 * declare module '../../core/kernel/contracts.js' {
 *   interface ServiceMap { 'threads.registry': ThreadRegistry }
 * }
 * ```
 */
export interface ServiceMap {
  'kernel.config': RuntimeConfig;
  'kernel.logger': StructuredLogger;
  'kernel.events': EventBus;
  'kernel.broadcaster': EventBroadcaster;
  'kernel.stores': StoreFactory;
  'kernel.workspaceRoot': string;
  'kernel.health': () => HealthStatus;
  'kernel.diagnostics': () => PluginDiagnostic[];
}

export type ServiceId = keyof ServiceMap;

export interface ServiceDefinition<K extends ServiceId = ServiceId> {
  id: K;
  pluginId: string;
  description: string;
  implementation: ServiceMap[K];
}

export interface PluginManifest {
  id: string;
  name: string;
  version: string;
  description?: string;
  dependencies?: string[];
  priority?: number;
}

export interface PluginRegistrationContext {
  registerGatewayMethod(method: GatewayMethodDefinition): void;
  registerHttpRoute(route: HttpRouteDefinition): void;
  registerService<K extends ServiceId>(service: ServiceDefinition<K>): void;
  getService<K extends ServiceId>(serviceId: K): ServiceMap[K] | undefined;
  /** Like {@link getService} but fails registration when the service is absent. */
  requireService<K extends ServiceId>(serviceId: K): ServiceMap[K];
  logger: StructuredLogger;
}

export interface TaskdeckPlugin {
  manifest: PluginManifest;
  setup(context: PluginRegistrationContext): void | Promise<void>;
  /** Runs after every plugin finished `setup`. */
  activate?(): void | Promise<void>;
  /** Runs on shutdown, in reverse registration order. */
  deactivate?(): void | Promise<void>;
}

export interface PluginDiagnostic {
  pluginId: string;
  status: 'loaded' | 'failed';
  reason?: string;
}
