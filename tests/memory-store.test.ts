import { describe, expect, test } from 'vitest';
import { MemoryDocumentStore } from '../src/core/store/json-store.js';
import { MemoryStore, type LiveThread } from '../src/plugins/memory/memory-store.js';
import type { MemoryDocument } from '../src/plugins/memory/types.js';
import { noopLogger } from './helpers.js';

function createStore(liveThreads: LiveThread[] = [], store = new MemoryDocumentStore<MemoryDocument>()): MemoryStore {
  let tick = 0;
  return new MemoryStore({
    store,
    logger: noopLogger(),
    liveThreads: () => liveThreads,
    now: () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++)),
  });
}

async function seed(memory: MemoryStore): Promise<void> {
  await memory.append({
    scope: 'permanent',
    event_type: 'task_completed',
    summary: 'Analyze TSLA earnings',
    content: 'Revenue grew',
    domain: 'Finance',
  });
  await memory.append({
    scope: { thread_id: 't1' },
    event_type: 'note',
    summary: 'Weather',
    content: 'TSLA mentioned in passing',
  });
  await memory.append({
    scope: { thread_id: 't1' },
    event_type: 'note',
    summary: 'Groceries',
    content: 'milk',
  });
}

describe('MemoryStore', () => {
  test('append fills defaults and scope', async () => {
    const memory = createStore();
    const permanent = await memory.append({ scope: 'permanent', event_type: 'note', summary: 'fact', content: 'body' });
    const scoped = await memory.append({
      scope: { thread_id: 't1' },
      event_type: 'note',
      summary: 'scoped',
      content: 'body',
      trace_id: 'trace-1',
    });

    expect(permanent).toMatchObject({ domain: 'General', thread_id: null, trace_id: null, timestamp: '2026-01-01T00:00:00.000Z' });
    expect(scoped).toMatchObject({ thread_id: 't1', trace_id: 'trace-1' });
    expect(Object.isFrozen(scoped)).toBe(true);
    expect(memory.count()).toBe(2);
  });

  test('search ranks whole-query matches above term matches', async () => {
    const memory = createStore();
    await seed(memory);

    const hits = memory.search('TSLA');
    expect(hits.map((hit) => [hit.summary, hit.score])).toEqual([
      ['Analyze TSLA earnings', 8],
      ['Weather', 6],
    ]);
  });

  test('search scores each term when the phrase is absent', async () => {
    const memory = createStore();
    await seed(memory);

    const hits = memory.search('tsla revenue');
    expect(hits.map((hit) => [hit.summary, hit.score])).toEqual([
      ['Analyze TSLA earnings', 2],
      ['Weather', 1],
    ]);
  });

  test('search filters by domain and clamps the limit', async () => {
    const memory = createStore();
    await seed(memory);

    expect(memory.search('tsla', { domain: 'finance' }).map((hit) => hit.summary)).toEqual(['Analyze TSLA earnings']);
    expect(memory.search('tsla', { limit: 0 })).toHaveLength(1);
    expect(memory.search('   ')).toEqual([]);
    expect(memory.search('nothing-like-this')).toEqual([]);
  });

  test('ties go to the newest record', async () => {
    const memory = createStore();
    await memory.append({ scope: 'permanent', event_type: 'note', summary: 'older note', content: '' });
    await memory.append({ scope: 'permanent', event_type: 'note', summary: 'newer note', content: '' });

    expect(memory.search('note').map((hit) => hit.summary)).toEqual(['newer note', 'older note']);
  });

  test('overview groups memories by live thread', async () => {
    const memory = createStore([
      { id: 't1', title: 'Research', updated_at: '2026-01-02T00:00:00.000Z' },
      { id: 't2', title: 'Empty', updated_at: '2026-01-03T00:00:00.000Z' },
    ]);
    await seed(memory);
    await memory.append({ scope: { thread_id: 'deleted' }, event_type: 'note', summary: 'orphan', content: '' });

    const overview = memory.overview();
    expect(overview.permanent.map((record) => record.summary)).toEqual(['Analyze TSLA earnings']);
    expect(overview.threads.map((group) => [group.thread.id, group.memory_count])).toEqual([
      ['t2', 0],
      ['t1', 2],
    ]);
    expect(overview.threads[1].memories.map((record) => record.summary)).toEqual(['Groceries', 'Weather']);
  });

  test('reload restores appended records', async () => {
    const backing = new MemoryDocumentStore<MemoryDocument>();
    await seed(createStore([], backing));

    const reloaded = createStore([], backing);
    await reloaded.load();
    expect(reloaded.count()).toBe(3);
    expect(reloaded.forThread('t1')).toHaveLength(2);
  });
});
