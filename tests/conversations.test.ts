import { describe, expect, test } from 'vitest';
import { EventBus } from '../src/core/kernel/event-bus.js';
import { ConversationRunner } from '../src/plugins/conversations/conversation-runner.js';
import { LoopbackTurnGenerator } from '../src/plugins/conversations/generator.js';
import type { StartConversationInput, TurnGenerator, TurnRequest } from '../src/plugins/conversations/types.js';
import { InvalidTransitionError, NotFoundError } from '../src/errors.js';
import { deferred, noopLogger, waitFor } from './helpers.js';

class ControlledGenerator implements TurnGenerator {
  readonly calls: Array<{ request: TurnRequest; resolve: (line: string) => void; reject: (error: unknown) => void }> = [];

  generate(request: TurnRequest): Promise<string> {
    const pending = deferred<string>();
    this.calls.push({ request, resolve: pending.resolve, reject: pending.reject });
    return pending.promise;
  }
}

function input(overrides: Partial<StartConversationInput> = {}): StartConversationInput {
  return {
    topic: 'Pricing',
    participants: [{ name: 'Ada', personality: 'skeptical' }, { name: 'Bob' }],
    max_turns: 3,
    ...overrides,
  };
}

function createRunner(generator: TurnGenerator, events = new EventBus()): ConversationRunner {
  return new ConversationRunner({ generator, events, logger: noopLogger() });
}

describe('ConversationRunner', () => {
  test('participants take turns until max_turns', async () => {
    const events = new EventBus();
    const turns: number[] = [];
    events.subscribe('conversations:turn', (event) => turns.push(event.payload.turn));
    const runner = createRunner(new LoopbackTurnGenerator(), events);

    const started = runner.start(input());
    expect(started.status).toBe('running');
    expect(started.transcript[0].content).toBe(
      'The topic of this conversation is: Pricing.\n\nParticipants:\n- Ada: skeptical\n- Bob'
    );

    const finished = await runner.settled(started.id);
    expect(finished.status).toBe('completed');
    expect(finished.turns_completed).toBe(3);
    expect(finished.transcript.map((entry) => entry.speaker)).toEqual([null, 'Ada', 'Bob', 'Ada']);
    expect(finished.transcript[2].content).toBe(`Bob on "Pricing" (turn 2): ${finished.transcript[1].content}`);
    expect(turns).toEqual([0, 1, 2]);
  });

  test('pause holds the next turn until resume', async () => {
    const generator = new ControlledGenerator();
    const runner = createRunner(generator);
    const { id } = runner.start(input({ max_turns: 2 }));
    await waitFor(() => generator.calls.length === 1);

    expect(runner.pause(id).status).toBe('paused');
    generator.calls[0].resolve('first line');
    await waitFor(() => runner.get(id).turns_completed === 1);
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(generator.calls).toHaveLength(1);

    expect(runner.resume(id).status).toBe('running');
    await waitFor(() => generator.calls.length === 2);
    expect(generator.calls[1].request.participant.name).toBe('Bob');
    generator.calls[1].resolve('second line');

    const finished = await runner.settled(id);
    expect(finished.status).toBe('completed');
    expect(finished.transcript.slice(1).map((entry) => entry.content)).toEqual(['first line', 'second line']);
  });

  test('stopping a paused run ends it', async () => {
    const generator = new ControlledGenerator();
    const runner = createRunner(generator);
    const { id } = runner.start(input());
    await waitFor(() => generator.calls.length === 1);
    runner.pause(id);
    generator.calls[0].resolve('only line');

    expect(runner.stop(id).status).toBe('stopped');
    const finished = await runner.settled(id);
    expect(finished.status).toBe('stopped');
    expect(finished.turns_completed).toBe(1);
    expect(() => runner.stop(id)).toThrow(InvalidTransitionError);
    expect(() => runner.resume(id)).toThrow('Cannot resume Conversation in state stopped');
  });

  test('injected lines reach the next turn', async () => {
    const generator = new ControlledGenerator();
    const runner = createRunner(generator);
    const { id } = runner.start(input({ max_turns: 2 }));
    await waitFor(() => generator.calls.length === 1);

    runner.inject(id, 'Focus on enterprise customers');
    generator.calls[0].resolve('noted');
    await waitFor(() => generator.calls.length === 2);

    const seen = generator.calls[1].request.transcript.map((entry) => entry.content);
    expect(seen.slice(1)).toEqual(['Focus on enterprise customers', 'noted']);
    generator.calls[1].resolve('done');
    await runner.settled(id);
  });

  test('a generator failure fails the run', async () => {
    const generator = new ControlledGenerator();
    const runner = createRunner(generator);
    const { id } = runner.start(input());
    await waitFor(() => generator.calls.length === 1);

    generator.calls[0].reject(new Error('model unavailable'));
    const finished = await runner.settled(id);
    expect(finished.status).toBe('failed');
    expect(finished.error).toBe('model unavailable');
    expect(() => runner.inject(id, 'late')).toThrow(InvalidTransitionError);
  });

  test('unknown ids are NotFound and pause needs a running run', async () => {
    const runner = createRunner(new LoopbackTurnGenerator());
    expect(() => runner.get('missing')).toThrow(NotFoundError);

    const { id } = runner.start(input());
    runner.pause(id);
    expect(() => runner.pause(id)).toThrow('Cannot pause Conversation in state paused');
    await runner.stopAll();
    expect(runner.get(id).status).toBe('stopped');
  });

  test('stopAll stops every unfinished run', async () => {
    const generator = new ControlledGenerator();
    const runner = createRunner(generator);
    const first = runner.start(input());
    const second = runner.start(input({ topic: 'Hiring' }));
    await waitFor(() => generator.calls.length === 2);

    const stopping = runner.stopAll();
    for (const call of generator.calls) call.resolve('last words');
    await stopping;

    expect(runner.list().map((conversation) => conversation.status)).toEqual(['stopped', 'stopped']);
    expect(runner.get(first.id).turns_completed).toBe(1);
    expect(runner.get(second.id).turns_completed).toBe(1);
  });

  test('evicts the oldest finished runs beyond the retention limit', async () => {
    const runner = new ConversationRunner({
      generator: new LoopbackTurnGenerator(),
      events: new EventBus(),
      logger: noopLogger(),
      retainFinished: 2,
    });

    const ids: string[] = [];
    for (const topic of ['First', 'Second', 'Third']) {
      const { id } = runner.start(input({ topic, max_turns: 1 }));
      ids.push(id);
      await runner.settled(id);
    }

    expect(() => runner.get(ids[0])).toThrow(NotFoundError);
    expect(runner.get(ids[1]).status).toBe('completed');
    expect(runner.list().map((conversation) => conversation.topic).sort()).toEqual(['Second', 'Third']);
  });
});
