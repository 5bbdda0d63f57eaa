import { randomUUID } from 'node:crypto';
import type { StructuredLogger } from '../../core/kernel/contracts.js';
import type { DocumentStore } from '../../core/store/json-store.js';
import { errorMessage } from '../../errors.js';
import type {
  AppendMemoryInput,
  MemoryDocument,
  MemoryOverview,
  MemoryRecord,
  MemorySearchHit
} from './types.js';

export interface LiveThread {
  id: string;
  title: string;
  updated_at: string;
}

export interface MemoryStoreOptions {
  store: DocumentStore<MemoryDocument>;
  logger: StructuredLogger;
  /** Threads that are still reachable; memories of any other thread stay out of the overview. */
  liveThreads: () => LiveThread[];
  now?: () => Date;
}

const DEFAULT_SEARCH_LIMIT = 10;

function normalizeText(input: string): string {
  return input.toLowerCase().replace(/\s+/g, ' ').trim();
}

function tokenize(input: string): string[] {
  return normalizeText(input)
    .split(/[^a-z0-9_]+/)
    .filter(Boolean)
    .slice(0, 32);
}

function newestFirst(a: MemoryRecord, b: MemoryRecord): number {
  return b.timestamp.localeCompare(a.timestamp) || b.memory_id.localeCompare(a.memory_id);
}

export class MemoryStore {
  private records: MemoryRecord[] = [];
  private readonly now: () => Date;

  constructor(private readonly options: MemoryStoreOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async load(): Promise<void> {
    const document = await this.options.store.load();
    this.records = document?.records ?? [];
  }

  async append(input: AppendMemoryInput): Promise<MemoryRecord> {
    const record: MemoryRecord = {
      memory_id: randomUUID(),
      event_type: input.event_type,
      summary: input.summary,
      content: input.content,
      domain: input.domain ?? 'General',
      timestamp: this.now().toISOString(),
      thread_id: input.scope === 'permanent' ? null : input.scope.thread_id,
      trace_id: input.trace_id ?? null,
      ...(input.details ? { details: input.details } : {})
    };
    this.records.push(Object.freeze(record));
    try {
      await this.options.store.save({ records: this.records });
    } catch (error) {
      this.options.logger.error('Failed to persist memory', { reason: errorMessage(error) });
    }
    return record;
  }

  forThread(threadId: string): MemoryRecord[] {
    return this.records.filter((record) => record.thread_id === threadId).sort(newestFirst);
  }

  overview(): MemoryOverview {
    const permanent = this.records.filter((record) => record.thread_id === null).sort(newestFirst);
    const threads = [...this.options.liveThreads()]
      .sort((a, b) => b.updated_at.localeCompare(a.updated_at))
      .map((thread) => {
        const memories = this.forThread(thread.id);
        return {
          thread: { id: thread.id, title: thread.title, updated_at: thread.updated_at },
          memory_count: memories.length,
          memories
        };
      });
    return { permanent, threads };
  }

  /**
   * Lexical ranking: +5 when the whole query occurs in summary or content,
   * +2 when it occurs in the summary, +1 per query term of two or more
   * characters. Zero scores are dropped; ties go to the newest record.
   */
  search(query: string, options: { domain?: string; limit?: number } = {}): MemorySearchHit[] {
    const q = query.trim();
    if (!q) return [];
    const qNorm = normalizeText(q);
    const terms = tokenize(q).filter((term) => term.length >= 2);
    const domain = options.domain ? normalizeText(options.domain) : null;
    const limit = Math.max(1, Math.min(200, Math.floor(options.limit ?? DEFAULT_SEARCH_LIMIT)));

    const hits: MemorySearchHit[] = [];
    for (const record of this.records) {
      if (domain && normalizeText(record.domain) !== domain) continue;
      const summaryNorm = normalizeText(record.summary);
      const textNorm = `${summaryNorm} ${normalizeText(record.content)}`;
      let score = 0;
      if (textNorm.includes(qNorm)) score += 5;
      if (summaryNorm.includes(qNorm)) score += 2;
      for (const term of terms) {
        if (textNorm.includes(term)) score += 1;
      }
      if (score <= 0) continue;
      hits.push({ ...record, score });
    }

    return hits
      .sort((a, b) => b.score - a.score || newestFirst(a, b))
      .slice(0, limit);
  }

  count(): number {
    return this.records.length;
  }
}
