import { z } from 'zod';
import type { JsonValue } from '../../core/kernel/contracts.js';
import { JsonObjectSchema } from '../../core/utils/json.js';

/** Immutable once appended. `thread_id` null means the permanent, cross-thread store. */
export interface MemoryRecord {
  memory_id: string;
  event_type: string;
  summary: string;
  content: string;
  domain: string;
  timestamp: string;
  thread_id: string | null;
  trace_id: string | null;
  details?: Record<string, JsonValue>;
}

export type MemoryScope = 'permanent' | { thread_id: string };

export interface AppendMemoryInput {
  scope: MemoryScope;
  event_type: string;
  summary: string;
  content: string;
  domain?: string;
  trace_id?: string;
  details?: Record<string, JsonValue>;
}

export const MemoryRecordSchema = z.object({
  memory_id: z.string(),
  event_type: z.string(),
  summary: z.string(),
  content: z.string(),
  domain: z.string(),
  timestamp: z.string(),
  thread_id: z.string().nullable(),
  trace_id: z.string().nullable(),
  details: JsonObjectSchema.optional(),
});

export const MemoryDocumentSchema = z.object({
  records: z.array(MemoryRecordSchema),
});
export type MemoryDocument = z.infer<typeof MemoryDocumentSchema>;

export const MemorySearchInputSchema = z.object({
  query: z.string(),
  domain: z.string().optional(),
  limit: z.number().int().optional(),
});

export const AppendMemoryInputSchema = z.object({
  scope: z.union([z.literal('permanent'), z.object({ thread_id: z.string().min(1) })]),
  event_type: z.string().min(1),
  summary: z.string().min(1),
  content: z.string(),
  domain: z.string().optional(),
  trace_id: z.string().optional(),
  details: JsonObjectSchema.optional(),
});

export interface MemorySearchHit extends MemoryRecord {
  score: number;
}

export interface ThreadMemoryGroup {
  thread: { id: string; title: string; updated_at: string };
  memory_count: number;
  memories: MemoryRecord[];
}

export interface MemoryOverview {
  permanent: MemoryRecord[];
  threads: ThreadMemoryGroup[];
}
