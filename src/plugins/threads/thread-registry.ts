/**
 * @module plugins/threads/thread-registry
 *
 * Owns thread identity, mode and settings. Every mutation of one thread runs
 * inside that thread's lock, so read-modify-write sequences on the same id
 * never interleave. `task_ids` only grows, and only through
 * {@link ThreadRegistry.appendTask}, which the scheduler calls from submit.
 */
import { randomUUID } from 'node:crypto';
import type { StructuredLogger } from '../../core/kernel/contracts.js';
import type { EventBus } from '../../core/kernel/event-bus.js';
import type { DocumentStore } from '../../core/store/json-store.js';
import { KeyedMutex } from '../../core/utils/keyed-mutex.js';
import { NotFoundError, errorMessage } from '../../errors.js';
import {
  DEFAULT_THREAD_SETTINGS,
  type Thread,
  type ThreadDocument,
  type ThreadMode,
  type ThreadSettingsPatch
} from './types.js';

declare module '../../core/kernel/event-bus.js' {
  interface EventMap {
    'threads:created': { thread: Thread };
    'threads:updated': { thread: Thread };
    'threads:deleted': { thread: Thread };
  }
}

export interface ThreadRegistryOptions {
  store: DocumentStore<ThreadDocument>;
  events: EventBus;
  logger: StructuredLogger;
  now?: () => Date;
  generateId?: () => string;
}

function cloneThread(thread: Thread): Thread {
  return { ...thread, task_ids: [...thread.task_ids], settings: { ...thread.settings } };
}

export class ThreadRegistry {
  private readonly threads = new Map<string, Thread>();
  private readonly locks = new KeyedMutex();
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(private readonly options: ThreadRegistryOptions) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async load(): Promise<void> {
    const document = await this.options.store.load();
    this.threads.clear();
    for (const thread of document?.threads ?? []) {
      this.threads.set(thread.id, thread);
    }
  }

  /** Creates a thread; `id` is generated unless the caller supplies one that is free. */
  async create(title: string, id?: string): Promise<Thread> {
    const threadId = id ?? this.generateId();
    return this.locks.run(threadId, async () => {
      const existing = this.threads.get(threadId);
      if (existing) {
        return cloneThread(existing);
      }

      const timestamp = this.now().toISOString();
      const thread: Thread = {
        id: threadId,
        title,
        task_ids: [],
        mode: 'auto',
        settings: { ...DEFAULT_THREAD_SETTINGS },
        created_at: timestamp,
        updated_at: timestamp
      };
      this.threads.set(threadId, thread);
      await this.persist();
      this.options.events.publish('threads:created', { thread: cloneThread(thread) });
      return cloneThread(thread);
    });
  }

  get(id: string): Thread {
    const thread = this.threads.get(id);
    if (!thread) {
      throw new NotFoundError('Thread', id);
    }
    return cloneThread(thread);
  }

  has(id: string): boolean {
    return this.threads.has(id);
  }

  /** Most recently updated first. */
  list(): Thread[] {
    return [...this.threads.values()]
      .sort((a, b) => b.updated_at.localeCompare(a.updated_at))
      .map(cloneThread);
  }

  async setMode(id: string, mode: ThreadMode): Promise<Thread> {
    return this.mutate(id, (thread) => {
      thread.mode = mode;
    });
  }

  /** Merges the supplied fields into the current settings; omitted fields keep their value. */
  async updateSettings(id: string, patch: ThreadSettingsPatch): Promise<Thread> {
    return this.mutate(id, (thread) => {
      thread.settings = {
        context_mode: patch.context_mode ?? thread.settings.context_mode,
        context_window: patch.context_window ?? thread.settings.context_window,
        system_terminal_enabled: patch.system_terminal_enabled ?? thread.settings.system_terminal_enabled
      };
    });
  }

  async rename(id: string, title: string): Promise<Thread> {
    return this.mutate(id, (thread) => {
      thread.title = title;
    });
  }

  /**
   * Removes the thread in one step; subscribers of `threads:deleted` cascade
   * to its tasks.
   */
  async delete(id: string): Promise<Thread> {
    return this.locks.run(id, async () => {
      const thread = this.threads.get(id);
      if (!thread) {
        throw new NotFoundError('Thread', id);
      }
      this.threads.delete(id);
      await this.persist();
      const removed = cloneThread(thread);
      this.options.events.publish('threads:deleted', { thread: removed });
      return removed;
    });
  }

  /**
   * Runs `create` under the thread's lock and appends the id it returns.
   * `create` runs only when the thread exists, so a concurrent delete either
   * happens first (NotFound) or after the append.
   */
  async appendTask<T extends { id: string }>(threadId: string, create: (thread: Thread) => T): Promise<T> {
    const { result } = await this.mutateWith(threadId, (thread) => {
      const created = create(cloneThread(thread));
      thread.task_ids.push(created.id);
      return created;
    });
    return result;
  }

  private async mutate(id: string, apply: (thread: Thread) => void): Promise<Thread> {
    const { thread } = await this.mutateWith(id, apply);
    return thread;
  }

  private async mutateWith<R>(id: string, apply: (thread: Thread) => R): Promise<{ thread: Thread; result: R }> {
    return this.locks.run(id, async () => {
      const thread = this.threads.get(id);
      if (!thread) {
        throw new NotFoundError('Thread', id);
      }
      const result = apply(thread);
      thread.updated_at = this.now().toISOString();
      await this.persist();
      const snapshot = cloneThread(thread);
      this.options.events.publish('threads:updated', { thread: snapshot });
      return { thread: snapshot, result };
    });
  }

  private async persist(): Promise<void> {
    try {
      await this.options.store.save({ threads: [...this.threads.values()] });
    } catch (error) {
      this.options.logger.error('Failed to persist threads', { reason: errorMessage(error) });
    }
  }
}
