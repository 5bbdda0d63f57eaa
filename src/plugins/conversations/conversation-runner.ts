/**
 * @module plugins/conversations/conversation-runner
 *
 * Multi-turn scripted exchanges between participants. Each run owns a
 * {@link CancellationToken} and a {@link PauseGate}; the loop checks both at
 * every turn boundary and never interrupts a turn already in progress, so a
 * paused run resumes with its transcript intact.
 */
import { randomUUID } from 'node:crypto';
import type { StructuredLogger } from '../../core/kernel/contracts.js';
import type { EventBus } from '../../core/kernel/event-bus.js';
import { CancellationToken, CancelledError, PauseGate } from '../../core/utils/cancellation.js';
import { sleep } from '../../core/utils/timing.js';
import { InvalidTransitionError, NotFoundError, errorMessage } from '../../errors.js';
import type {
  Conversation,
  ConversationStatus,
  Participant,
  StartConversationInput,
  TranscriptEntry,
  TurnGenerator
} from './types.js';

declare module '../../core/kernel/event-bus.js' {
  interface EventMap {
    'conversations:updated': { conversation: Conversation };
    'conversations:turn': {
      conversation_id: string;
      thread_id: string | null;
      turn: number;
      participant: Participant;
      content: string;
    };
  }
}

export interface ConversationRunnerOptions {
  generator: TurnGenerator;
  events: EventBus;
  logger: StructuredLogger;
  /** Pause between turns. */
  turnDelayMs?: number;
  /** Finished runs kept for `get` and `list`; older ones are evicted first. Default 100. */
  retainFinished?: number;
  now?: () => Date;
}

const DEFAULT_RETAIN_FINISHED = 100;

interface Run {
  conversation: Conversation;
  token: CancellationToken;
  gate: PauseGate;
  done: Promise<void>;
  exited: boolean;
}

function isFinished(status: ConversationStatus): boolean {
  return status === 'stopped' || status === 'completed' || status === 'failed';
}

function cloneConversation(conversation: Conversation): Conversation {
  return {
    ...conversation,
    participants: conversation.participants.map((participant) => ({ ...participant })),
    transcript: conversation.transcript.map((entry) => ({ ...entry })),
  };
}

export class ConversationRunner {
  private readonly runs = new Map<string, Run>();
  private readonly now: () => Date;

  constructor(private readonly options: ConversationRunnerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /** Registers the run and starts its loop in the background. */
  start(input: StartConversationInput): Conversation {
    const timestamp = this.now().toISOString();
    const conversation: Conversation = {
      id: randomUUID(),
      topic: input.topic,
      participants: input.participants.map((participant) => ({ ...participant })),
      max_turns: input.max_turns,
      thread_id: input.thread_id ?? null,
      status: 'running',
      turns_completed: 0,
      transcript: [{ role: 'system', speaker: null, content: this.opening(input), at: timestamp }],
      error: null,
      created_at: timestamp,
      updated_at: timestamp,
    };

    const run: Run = {
      conversation,
      token: new CancellationToken(),
      gate: new PauseGate(),
      done: Promise.resolve(),
      exited: false,
    };
    this.runs.set(conversation.id, run);
    this.changed(run);
    run.done = this.loop(run).finally(() => {
      run.exited = true;
      this.evictFinished();
    });
    this.options.logger.info('Conversation started', {
      conversationId: conversation.id,
      participants: conversation.participants.length,
      maxTurns: conversation.max_turns,
    });
    return cloneConversation(conversation);
  }

  pause(id: string): Conversation {
    const run = this.require(id);
    if (run.conversation.status !== 'running') {
      throw new InvalidTransitionError('Conversation', run.conversation.status, 'pause');
    }
    run.gate.pause();
    this.setStatus(run, 'paused');
    return cloneConversation(run.conversation);
  }

  resume(id: string): Conversation {
    const run = this.require(id);
    if (run.conversation.status !== 'paused') {
      throw new InvalidTransitionError('Conversation', run.conversation.status, 'resume');
    }
    this.setStatus(run, 'running');
    run.gate.resume();
    return cloneConversation(run.conversation);
  }

  /** Ends the run at the next turn boundary; a paused run is released and ends at once. */
  stop(id: string): Conversation {
    const run = this.require(id);
    if (isFinished(run.conversation.status)) {
      throw new InvalidTransitionError('Conversation', run.conversation.status, 'stop');
    }
    run.token.cancel('stopped');
    this.setStatus(run, 'stopped');
    return cloneConversation(run.conversation);
  }

  /** Adds a system line the next turn will see. */
  inject(id: string, message: string): Conversation {
    const run = this.require(id);
    if (isFinished(run.conversation.status)) {
      throw new InvalidTransitionError('Conversation', run.conversation.status, 'inject into');
    }
    run.conversation.transcript.push({ role: 'system', speaker: null, content: message, at: this.now().toISOString() });
    this.changed(run);
    return cloneConversation(run.conversation);
  }

  get(id: string): Conversation {
    return cloneConversation(this.require(id).conversation);
  }

  list(): Conversation[] {
    return [...this.runs.values()]
      .map((run) => cloneConversation(run.conversation))
      .sort((a, b) => b.created_at.localeCompare(a.created_at));
  }

  /** Resolves when the run's loop has exited. */
  async settled(id: string): Promise<Conversation> {
    const run = this.require(id);
    await run.done;
    return cloneConversation(run.conversation);
  }

  /** Stops every unfinished run and waits for the loops to exit. */
  async stopAll(): Promise<void> {
    const active = [...this.runs.values()].filter((run) => !isFinished(run.conversation.status));
    for (const run of active) {
      this.stop(run.conversation.id);
    }
    await Promise.allSettled(active.map((run) => run.done));
  }

  private async loop(run: Run): Promise<void> {
    const { conversation, token, gate } = run;
    const participants = conversation.participants;
    try {
      for (let turn = conversation.turns_completed; turn < conversation.max_turns; turn++) {
        await gate.wait(token);
        token.throwIfCancelled();

        const participant = participants[turn % participants.length];
        const content = await this.options.generator.generate({
          conversation_id: conversation.id,
          topic: conversation.topic,
          participant,
          turn,
          transcript: conversation.transcript.map((entry) => ({ ...entry })),
          signal: token.signal,
        });

        const entry: TranscriptEntry = {
          role: 'participant',
          speaker: participant.name,
          content,
          at: this.now().toISOString(),
        };
        conversation.transcript.push(entry);
        conversation.turns_completed = turn + 1;
        this.options.events.publish('conversations:turn', {
          conversation_id: conversation.id,
          thread_id: conversation.thread_id,
          turn,
          participant: { ...participant },
          content,
        });
        this.changed(run);

        const delay = this.options.turnDelayMs ?? 0;
        if (delay > 0 && turn + 1 < conversation.max_turns) {
          await sleep(delay, token.signal);
        }
      }
      token.throwIfCancelled();
      this.setStatus(run, 'completed');
      this.options.logger.info('Conversation completed', {
        conversationId: conversation.id,
        turns: conversation.turns_completed,
      });
    } catch (error) {
      if (error instanceof CancelledError || token.cancelled) {
        this.setStatus(run, 'stopped');
        this.options.logger.info('Conversation stopped', {
          conversationId: conversation.id,
          turns: conversation.turns_completed,
        });
        return;
      }
      conversation.error = errorMessage(error);
      this.setStatus(run, 'failed');
      this.options.logger.error('Conversation failed', {
        conversationId: conversation.id,
        turn: conversation.turns_completed,
        reason: conversation.error,
      });
    }
  }

  /** Drops the oldest finished runs beyond the retention limit. Runs are kept in start order. */
  private evictFinished(): void {
    const limit = this.options.retainFinished ?? DEFAULT_RETAIN_FINISHED;
    const finished = [...this.runs.values()].filter((run) => run.exited);
    for (const run of finished.slice(0, Math.max(0, finished.length - limit))) {
      this.runs.delete(run.conversation.id);
    }
  }

  private opening(input: StartConversationInput): string {
    const roster = input.participants
      .map((participant) => (participant.personality ? `- ${participant.name}: ${participant.personality}` : `- ${participant.name}`))
      .join('\n');
    return `The topic of this conversation is: ${input.topic}.\n\nParticipants:\n${roster}`;
  }

  private setStatus(run: Run, status: ConversationStatus): void {
    if (run.conversation.status === status) return;
    run.conversation.status = status;
    this.changed(run);
  }

  private changed(run: Run): void {
    run.conversation.updated_at = this.now().toISOString();
    this.options.events.publish('conversations:updated', { conversation: cloneConversation(run.conversation) });
  }

  private require(id: string): Run {
    const run = this.runs.get(id);
    if (!run) {
      throw new NotFoundError('Conversation', id);
    }
    return run;
  }
}
