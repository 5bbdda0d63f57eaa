import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { RuntimeConfig, StructuredLogger, TaskdeckPlugin } from '../src/core/kernel/contracts.js';
import { EventBus } from '../src/core/kernel/event-bus.js';
import { createLogger, type KernelLogger } from '../src/core/kernel/logger.js';
import { TaskdeckKernel } from '../src/core/kernel/kernel.js';
import { MemoryDocumentStore } from '../src/core/store/json-store.js';
import { defaultRuntimeConfig } from '../src/core/config/runtime-config.js';
import { ThreadRegistry } from '../src/plugins/threads/thread-registry.js';
import type { ThreadDocument } from '../src/plugins/threads/types.js';
import { bundledPlugins, type BundledPluginOptions } from '../src/plugins/index.js';
import type { PackageIndex, PackageInstaller, PackageMetadata } from '../src/plugins/packages/types.js';
import type { TaskExecutionOutput, TaskExecutionRequest, TaskExecutor } from '../src/plugins/tasks/types.js';

export function noopLogger(): StructuredLogger {
  return {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
  };
}

export function silentLogger(level: RuntimeConfig['logging']['level'] = 'error'): KernelLogger {
  const logger = createLogger(level);
  logger.setTerminalOutputEnabled(false);
  return logger;
}

/** Memory-only config bound to an ephemeral port. */
export function testConfig(): RuntimeConfig {
  const config = defaultRuntimeConfig('/tmp/taskdeck-test');
  config.gateway.port = 0;
  config.storage.dir = null;
  config.scheduler.retryBackoffMs = 1;
  config.broadcaster.agentsIntervalMs = 60_000;
  config.broadcaster.heartbeatMs = 60_000;
  config.logging.level = 'error';
  return config;
}

export async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), 'taskdeck-test-'));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** Polls `predicate` until it holds or `timeoutMs` passes. */
export async function waitFor(predicate: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: unknown) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function createThreadRegistry(events: EventBus = new EventBus()): ThreadRegistry {
  return new ThreadRegistry({ store: new MemoryDocumentStore<ThreadDocument>(), events, logger: noopLogger() });
}

/**
 * Executor whose calls stay pending until the test settles them. Each call
 * is recorded with its request.
 */
export class ControlledExecutor implements TaskExecutor {
  readonly calls: Array<{
    request: TaskExecutionRequest;
    resolve: (output: TaskExecutionOutput) => void;
    reject: (error: unknown) => void;
  }> = [];

  execute(request: TaskExecutionRequest): Promise<TaskExecutionOutput> {
    const pending = deferred<TaskExecutionOutput>();
    this.calls.push({ request, resolve: pending.resolve, reject: pending.reject });
    return pending.promise;
  }

  callFor(taskId: string): ControlledExecutor['calls'][number] {
    const call = this.calls.find((item) => item.request.task.id === taskId);
    if (!call) {
      throw new Error(`No executor call for ${taskId}`);
    }
    return call;
  }
}

/** Executor that answers from a function, synchronously resolved. */
export class ScriptedExecutor implements TaskExecutor {
  constructor(private readonly answer: (request: TaskExecutionRequest) => TaskExecutionOutput | Promise<TaskExecutionOutput>) {}

  async execute(request: TaskExecutionRequest): Promise<TaskExecutionOutput> {
    return this.answer(request);
  }
}

export class FakeInstaller implements PackageInstaller {
  readonly installed = new Map<string, string>();
  readonly installCalls: string[] = [];
  failInstall: string | null = null;
  failUninstall: string | null = null;

  async install(name: string, version?: string): Promise<{ version: string }> {
    this.installCalls.push(name);
    if (this.failInstall) {
      throw new Error(this.failInstall);
    }
    const resolved = version ?? '1.0.0';
    this.installed.set(name, resolved);
    return { version: resolved };
  }

  async uninstall(name: string): Promise<void> {
    if (this.failUninstall) {
      throw new Error(this.failUninstall);
    }
    this.installed.delete(name);
  }

  async listInstalled(): Promise<Map<string, string>> {
    return new Map(this.installed);
  }
}

export function sampleMetadata(overrides: Partial<PackageMetadata> = {}): PackageMetadata {
  return {
    safety_score: 90,
    safety_level: 'HIGH',
    safety_reasons: ['Established package (5+ years)'],
    version: '2.1.0',
    author: 'Example Author',
    downloads_last_month: 2_000_000,
    first_release: '2015-01-01T00:00:00.000Z',
    last_release: '2026-09-01T00:00:00.000Z',
    total_releases: 60,
    description: 'Example package',
    ...overrides,
  };
}

export class FakeIndex implements PackageIndex {
  readonly known = new Map<string, PackageMetadata>();
  unavailable = false;

  async lookup(name: string): Promise<PackageMetadata | null> {
    if (this.unavailable) {
      throw new Error('index offline');
    }
    return this.known.get(name) ?? null;
  }
}

export interface TestKernelOptions extends BundledPluginOptions {
  config?: RuntimeConfig;
  logger?: KernelLogger;
  plugins?: TaskdeckPlugin[];
}

/** Kernel with every bundled plugin, memory-only stores and fake collaborators by default. */
export async function createTestKernel(options: TestKernelOptions = {}): Promise<TaskdeckKernel> {
  const plugins = options.plugins ?? bundledPlugins({
    tasks: options.tasks ?? { executor: new ScriptedExecutor((request) => ({ response: `echo: ${request.task.prompt}` })) },
    packages: options.packages ?? { installer: new FakeInstaller(), index: new FakeIndex() },
    conversations: options.conversations,
    startedAt: options.startedAt,
  });
  return TaskdeckKernel.create({
    workspaceRoot: '/tmp/taskdeck-test',
    config: options.config ?? testConfig(),
    logger: options.logger ?? silentLogger(),
    plugins,
  });
}
