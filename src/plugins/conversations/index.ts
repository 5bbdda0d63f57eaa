/**
 * @module plugins/conversations
 *
 * Cancellable multi-turn scripted exchanges. Each turn is published as an
 * `agent_step` on the chat channel; a finished run bound to a thread leaves a
 * memory record on that thread.
 */
import type { TaskdeckPlugin } from '../../core/kernel/contracts.js';
import { json, readInput } from '../../core/gateway/http.js';
import { errorMessage } from '../../errors.js';
import { ConversationRunner } from './conversation-runner.js';
import { LoopbackTurnGenerator } from './generator.js';
import { InjectMessageInputSchema, StartConversationInputSchema, type TurnGenerator } from './types.js';

declare module '../../core/kernel/contracts.js' {
  interface ServiceMap {
    'conversations.runner': ConversationRunner;
  }
}

const PLUGIN_ID = 'taskdeck.conversations';

export interface ConversationsPluginOptions {
  generator?: TurnGenerator;
  turnDelayMs?: number;
  retainFinished?: number;
}

type ControlAction = 'pause' | 'resume' | 'stop';
const CONTROL_ACTIONS: readonly ControlAction[] = ['pause', 'resume', 'stop'];

export function createConversationsPlugin(options: ConversationsPluginOptions = {}): TaskdeckPlugin {
  let runner: ConversationRunner | undefined;
  const unsubscribers: Array<() => void> = [];

  return {
    manifest: {
      id: PLUGIN_ID,
      name: 'Conversations',
      version: '0.1.0',
      description: 'Multi-participant scripted exchanges with pause, resume and stop',
      dependencies: ['taskdeck.threads', 'taskdeck.memory'],
      priority: 50,
    },
    setup: (context) => {
      const events = context.requireService('kernel.events');
      const broadcaster = context.requireService('kernel.broadcaster');
      const threads = context.requireService('threads.registry');
      const memory = context.getService('memory.store');

      const conversations = new ConversationRunner({
        generator: options.generator ?? new LoopbackTurnGenerator(context.logger),
        events,
        logger: context.logger,
        turnDelayMs: options.turnDelayMs,
        retainFinished: options.retainFinished,
      });
      runner = conversations;

      context.registerService({
        id: 'conversations.runner',
        pluginId: PLUGIN_ID,
        description: 'Scripted conversation runner',
        implementation: conversations,
      });

      unsubscribers.push(
        events.subscribe('conversations:turn', ({ payload }) => {
          broadcaster.publish('chat', 'agent_step', {
            conversation_id: payload.conversation_id,
            thread_id: payload.thread_id,
            turn: payload.turn,
            agent: payload.participant.name,
            content: payload.content,
          });
        }),
        events.subscribe('conversations:updated', ({ payload }) => {
          const conversation = payload.conversation;
          if (conversation.status !== 'completed' || !conversation.thread_id || !memory) return;
          memory
            .append({
              scope: { thread_id: conversation.thread_id },
              event_type: 'conversation_completed',
              summary: `Conversation on ${conversation.topic}`.slice(0, 160),
              content: conversation.transcript
                .filter((entry) => entry.role === 'participant')
                .map((entry) => `${entry.speaker ?? 'system'}: ${entry.content}`)
                .join('\n'),
              trace_id: conversation.id,
            })
            .catch((error: unknown) => {
              context.logger.error('Failed to record conversation memory', {
                conversationId: conversation.id,
                reason: errorMessage(error),
              });
            });
        }),
      );

      context.registerHttpRoute({
        method: 'POST',
        path: '/api/conversations',
        pluginId: PLUGIN_ID,
        description: 'Start a conversation',
        handler: async (req, res) => {
          const input = await readInput(req, StartConversationInputSchema);
          if (input.thread_id) {
            threads.get(input.thread_id);
          }
          json(res, 201, { conversation: conversations.start(input) });
        },
      });

      context.registerHttpRoute({
        method: 'GET',
        path: '/api/conversations',
        pluginId: PLUGIN_ID,
        description: 'List conversations, newest first',
        handler: async (_req, res) => {
          json(res, 200, { conversations: conversations.list() });
        },
      });

      context.registerHttpRoute({
        method: 'GET',
        path: '/api/conversations/:id',
        pluginId: PLUGIN_ID,
        description: 'One conversation with its transcript',
        handler: async (_req, res, ctx) => {
          json(res, 200, { conversation: conversations.get(ctx.params.id) });
        },
      });

      for (const action of CONTROL_ACTIONS) {
        context.registerHttpRoute({
          method: 'POST',
          path: `/api/conversations/:id/${action}`,
          pluginId: PLUGIN_ID,
          description: `${action} a conversation`,
          handler: async (_req, res, ctx) => {
            json(res, 200, { conversation: conversations[action](ctx.params.id) });
          },
        });
      }

      context.registerHttpRoute({
        method: 'POST',
        path: '/api/conversations/:id/inject',
        pluginId: PLUGIN_ID,
        description: 'Add a system line for the next turn',
        handler: async (req, res, ctx) => {
          const { message } = await readInput(req, InjectMessageInputSchema);
          json(res, 200, { conversation: conversations.inject(ctx.params.id, message) });
        },
      });
    },
    deactivate: async () => {
      await runner?.stopAll();
      for (const unsubscribe of unsubscribers.splice(0)) unsubscribe();
    },
  };
}
