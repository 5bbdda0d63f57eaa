import { z } from 'zod';

export const CONVERSATION_STATUSES = ['running', 'paused', 'stopped', 'completed', 'failed'] as const;
export type ConversationStatus = (typeof CONVERSATION_STATUSES)[number];

export const ParticipantSchema = z.object({
  name: z.string().trim().min(1).max(64),
  model: z.string().optional(),
  personality: z.string().optional(),
});
export type Participant = z.infer<typeof ParticipantSchema>;

export const StartConversationInputSchema = z.object({
  topic: z.string().trim().min(1, 'Topic must not be empty'),
  participants: z.array(ParticipantSchema).min(2, 'At least two participants are required'),
  /** Total turns across all participants. */
  max_turns: z.number().int().min(1).max(500).default(10),
  thread_id: z.string().min(1).optional(),
});
export type StartConversationInput = z.infer<typeof StartConversationInputSchema>;

export const InjectMessageInputSchema = z.object({
  message: z.string().trim().min(1),
});

export interface TranscriptEntry {
  role: 'system' | 'participant';
  /** Participant name; null for system lines. */
  speaker: string | null;
  content: string;
  at: string;
}

export interface Conversation {
  id: string;
  topic: string;
  participants: Participant[];
  max_turns: number;
  thread_id: string | null;
  status: ConversationStatus;
  turns_completed: number;
  transcript: TranscriptEntry[];
  error: string | null;
  created_at: string;
  updated_at: string;
}

export interface TurnRequest {
  conversation_id: string;
  topic: string;
  participant: Participant;
  turn: number;
  transcript: readonly TranscriptEntry[];
  /** Aborted when the conversation is stopped. */
  signal: AbortSignal;
}

/** Produces one participant's next line. */
export interface TurnGenerator {
  generate(request: TurnRequest): Promise<string>;
}
