import { describe, expect, test } from 'vitest';
import { AgentRoster, type AgentActivity, type RosterSnapshot } from '../src/plugins/agents/agent-roster.js';

function worker(id: string, taskId: string, startedAt: string, status = 'running'): AgentActivity {
  return { agent_id: id, kind: 'worker', task_id: taskId, thread_id: 't1', status, started_at: startedAt };
}

describe('AgentRoster', () => {
  test('snapshots sort by start time and count running entries', () => {
    const roster = new AgentRoster();
    roster.upsert(worker('worker-1', 'b', '2026-01-01T00:00:02.000Z'));
    roster.upsert(worker('worker-0', 'a', '2026-01-01T00:00:01.000Z'));
    roster.upsert({ ...worker('conv-1', 'c', '2026-01-01T00:00:03.000Z', 'paused'), kind: 'conversation', task_id: null });

    const snapshot = roster.snapshot();
    expect(snapshot.agents.map((entry) => entry.agent_id)).toEqual(['worker-0', 'worker-1', 'conv-1']);
    expect(snapshot.active_count).toBe(2);
  });

  test('records steps on known entries only', () => {
    const roster = new AgentRoster();
    roster.upsert(worker('worker-0', 'a', '2026-01-01T00:00:01.000Z'));
    roster.recordStep('worker-0', 'searching');
    roster.recordStep('ghost', 'ignored');

    expect(roster.snapshot().agents).toEqual([{ ...worker('worker-0', 'a', '2026-01-01T00:00:01.000Z'), last_step: 'searching' }]);
  });

  test('removes entries by task', () => {
    const roster = new AgentRoster();
    roster.upsert(worker('worker-0', 'a', '2026-01-01T00:00:01.000Z'));

    expect(roster.removeTask('missing')).toBe(false);
    expect(roster.removeTask('a')).toBe(true);
    expect(roster.snapshot()).toEqual({ agents: [], active_count: 0 });
  });

  test('notifies listeners on every change until unsubscribed', () => {
    const roster = new AgentRoster();
    const counts: number[] = [];
    const off = roster.onChange((snapshot: RosterSnapshot) => counts.push(snapshot.agents.length));

    roster.upsert(worker('worker-0', 'a', '2026-01-01T00:00:01.000Z'));
    roster.recordStep('worker-0', 'step');
    roster.remove('worker-0');
    roster.remove('worker-0');
    off();
    roster.upsert(worker('worker-1', 'b', '2026-01-01T00:00:02.000Z'));

    expect(counts).toEqual([1, 1, 0]);
  });
});
