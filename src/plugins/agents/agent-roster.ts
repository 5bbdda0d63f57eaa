/**
 * Live view of in-flight activity for the agents channel: one entry per
 * running task, plus one per active scripted conversation. Nothing here is
 * persisted; the roster is rebuilt from running work.
 */

export type AgentKind = 'worker' | 'conversation';

export interface AgentActivity {
  agent_id: string;
  kind: AgentKind;
  task_id: string | null;
  thread_id: string | null;
  status: string;
  started_at: string;
  last_step?: string;
}

export interface RosterSnapshot {
  agents: AgentActivity[];
  active_count: number;
}

export class AgentRoster {
  private readonly entries = new Map<string, AgentActivity>();
  private readonly listeners = new Set<(snapshot: RosterSnapshot) => void>();

  upsert(entry: AgentActivity): void {
    this.entries.set(entry.agent_id, { ...entry });
    this.notify();
  }

  /** Updates the latest step of a known entry; unknown ids are ignored. */
  recordStep(agentId: string, step: string): void {
    const entry = this.entries.get(agentId);
    if (!entry) return;
    entry.last_step = step;
    this.notify();
  }

  remove(agentId: string): boolean {
    const removed = this.entries.delete(agentId);
    if (removed) this.notify();
    return removed;
  }

  /** Removes the entry bound to `taskId`, whichever worker held it. */
  removeTask(taskId: string): boolean {
    for (const entry of this.entries.values()) {
      if (entry.task_id === taskId) {
        return this.remove(entry.agent_id);
      }
    }
    return false;
  }

  snapshot(): RosterSnapshot {
    const agents = [...this.entries.values()]
      .sort((a, b) => a.started_at.localeCompare(b.started_at) || a.agent_id.localeCompare(b.agent_id))
      .map((entry) => ({ ...entry }));
    return {
      agents,
      active_count: agents.filter((entry) => entry.status === 'running').length,
    };
  }

  onChange(listener: (snapshot: RosterSnapshot) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notify(): void {
    const snapshot = this.snapshot();
    for (const listener of this.listeners) listener(snapshot);
  }
}
