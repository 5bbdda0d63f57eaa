import { z } from 'zod';

export const CHANNELS = ['chat', 'logs', 'agents'] as const;
export type ChannelName = (typeof CHANNELS)[number];

export function isChannelName(value: string): value is ChannelName {
  return CHANNELS.some((channel) => channel === value);
}

export type EnvelopeType =
  | 'response'
  | 'task_update'
  | 'agent_step'
  | 'package_update'
  | 'package_installed'
  | 'package_failed'
  | 'thread_update'
  | 'log'
  | 'heartbeat'
  | 'agents_update';

/** Pushed event. At-most-once, no replay: clients reconcile through the pull endpoints. */
export interface ChannelEnvelope<T = unknown> {
  type: EnvelopeType;
  payload: T;
  at: string;
}

export const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('chat'),
    thread_id: z.string().min(1),
    prompt: z.string().min(1),
  }),
  z.object({
    type: z.literal('ping'),
    ts: z.number().optional(),
  }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export type ControlMessage =
  | { type: 'hello'; channel: ChannelName; server_time: string }
  | { type: 'task_submitted'; task_id: string; status: string }
  | { type: 'pong'; ts: number }
  | { type: 'error'; code: string; message: string };

export type ServerMessage = ChannelEnvelope | ControlMessage;

const ENVELOPE_TYPES = [
  'response',
  'task_update',
  'agent_step',
  'package_update',
  'package_installed',
  'package_failed',
  'thread_update',
  'log',
  'heartbeat',
  'agents_update',
] as const satisfies readonly EnvelopeType[];

const EnvelopeSchema = z.object({
  type: z.enum(ENVELOPE_TYPES),
  payload: z.unknown(),
  at: z.string(),
});

const ControlMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('hello'), channel: z.enum(CHANNELS), server_time: z.string() }),
  z.object({ type: z.literal('task_submitted'), task_id: z.string(), status: z.string() }),
  z.object({ type: z.literal('pong'), ts: z.number() }),
  z.object({ type: z.literal('error'), code: z.string(), message: z.string() }),
]);

/** Shape check for frames arriving at a client; envelope payloads stay untyped. */
export function parseServerMessage(raw: string): ServerMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  const control = ControlMessageSchema.safeParse(parsed);
  if (control.success) {
    return control.data;
  }
  const envelope = EnvelopeSchema.safeParse(parsed);
  if (envelope.success) {
    return { type: envelope.data.type, payload: envelope.data.payload, at: envelope.data.at };
  }
  return null;
}

export function isControlMessage(message: ServerMessage): message is ControlMessage {
  return message.type === 'hello'
    || message.type === 'task_submitted'
    || message.type === 'pong'
    || message.type === 'error';
}
