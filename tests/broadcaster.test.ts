import { describe, expect, test } from 'vitest';
import { EventBroadcaster, type ChannelSubscriber } from '../src/core/gateway/broadcaster.js';
import { isChannelName, parseServerMessage } from '../src/core/gateway/protocol.js';
import { noopLogger } from './helpers.js';

class RecordingSubscriber implements ChannelSubscriber {
  readonly frames: string[] = [];
  open = true;
  failing = false;

  constructor(readonly id: string) {}

  isOpen(): boolean {
    return this.open;
  }

  send(data: string): void {
    if (this.failing) {
      throw new Error('socket write failed');
    }
    this.frames.push(data);
  }
}

describe('EventBroadcaster', () => {
  test('delivers envelopes only to the channel subscribers', () => {
    const broadcaster = new EventBroadcaster();
    const chat = new RecordingSubscriber('chat-1');
    const logs = new RecordingSubscriber('logs-1');
    broadcaster.subscribe('chat', chat);
    broadcaster.subscribe('logs', logs);

    const report = broadcaster.publish('chat', 'response', { task_id: 't1', response: 'done' });

    expect(report).toEqual({ delivered: 1, dropped: 0 });
    expect(logs.frames).toEqual([]);
    const frame: unknown = JSON.parse(chat.frames[0]);
    expect(frame).toMatchObject({ type: 'response', payload: { task_id: 't1', response: 'done' } });
  });

  test('a failing subscriber does not block the others', () => {
    const broadcaster = new EventBroadcaster();
    const broken = new RecordingSubscriber('broken');
    broken.failing = true;
    const healthy = new RecordingSubscriber('healthy');
    broadcaster.subscribe('agents', broken);
    broadcaster.subscribe('agents', healthy);

    const report = broadcaster.publish('agents', 'agents_update', { active_count: 0 });

    expect(report).toEqual({ delivered: 1, dropped: 1 });
    expect(healthy.frames).toHaveLength(1);
    expect(broadcaster.subscriberCount('agents')).toBe(2);
  });

  test('closed subscribers are pruned on publish', () => {
    const broadcaster = new EventBroadcaster();
    const gone = new RecordingSubscriber('gone');
    gone.open = false;
    broadcaster.subscribe('logs', gone);

    expect(broadcaster.publish('logs', 'log', { message: 'x' })).toEqual({ delivered: 0, dropped: 1 });
    expect(broadcaster.subscriberCount()).toBe(0);
  });

  test('unsubscribe and clear remove subscribers', () => {
    const broadcaster = new EventBroadcaster();
    const off = broadcaster.subscribe('chat', new RecordingSubscriber('a'));
    broadcaster.subscribe('logs', new RecordingSubscriber('b'));
    expect(broadcaster.subscriberCount()).toBe(2);

    off();
    expect(broadcaster.subscriberCount('chat')).toBe(0);
    broadcaster.clear();
    expect(broadcaster.subscriberCount()).toBe(0);
  });

  test('taps observe every publish even without subscribers', () => {
    const broadcaster = new EventBroadcaster();
    const seen: string[] = [];
    const off = broadcaster.tap((channel, envelope) => seen.push(`${channel}:${envelope.type}`));

    broadcaster.publish('chat', 'task_update', {});
    off();
    broadcaster.publish('chat', 'task_update', {});

    expect(seen).toEqual(['chat:task_update']);
  });

  test('a failing tap is logged and delivery continues', () => {
    const warnings: string[] = [];
    const broadcaster = new EventBroadcaster({ ...noopLogger(), warn: (message) => warnings.push(message) });
    const received: string[] = [];
    broadcaster.tap(() => {
      throw new Error('tap broke');
    });
    broadcaster.subscribe('logs', { id: 's1', isOpen: () => true, send: (data) => received.push(data) });

    const report = broadcaster.publish('logs', 'heartbeat', {});

    expect(report).toEqual({ delivered: 1, dropped: 0 });
    expect(received).toHaveLength(1);
    expect(warnings).toEqual(['Broadcast tap failed']);
  });
});

describe('protocol', () => {
  test('recognizes channel names', () => {
    expect(isChannelName('chat')).toBe(true);
    expect(isChannelName('metrics')).toBe(false);
  });

  test('parses control frames and envelopes', () => {
    expect(parseServerMessage('{"type":"pong","ts":5}')).toEqual({ type: 'pong', ts: 5 });
    expect(parseServerMessage('{"type":"log","payload":{"message":"x"},"at":"2026-01-01T00:00:00.000Z"}')).toEqual({
      type: 'log',
      payload: { message: 'x' },
      at: '2026-01-01T00:00:00.000Z',
    });
    expect(parseServerMessage('{"type":"unknown"}')).toBeNull();
    expect(parseServerMessage('not json')).toBeNull();
  });
});
