import { z } from 'zod';

export const THREAD_MODES = ['auto', 'chat_only'] as const;
export type ThreadMode = (typeof THREAD_MODES)[number];

export const CONTEXT_MODES = ['smart', 'window', 'full'] as const;
export type ContextMode = (typeof CONTEXT_MODES)[number];

export interface ThreadSettings {
  context_mode: ContextMode;
  context_window: number;
  system_terminal_enabled: boolean;
}

export interface Thread {
  id: string;
  title: string;
  /** Append-only; written only through the scheduler's submit path. */
  task_ids: string[];
  mode: ThreadMode;
  settings: ThreadSettings;
  created_at: string;
  updated_at: string;
}

export const DEFAULT_THREAD_SETTINGS: ThreadSettings = {
  context_mode: 'smart',
  context_window: 5,
  system_terminal_enabled: false,
};

export const ThreadSettingsSchema = z.object({
  context_mode: z.enum(CONTEXT_MODES),
  context_window: z.number().int().positive(),
  system_terminal_enabled: z.boolean(),
}).strict();

export const ThreadSettingsPatchSchema = ThreadSettingsSchema.partial();
export type ThreadSettingsPatch = z.infer<typeof ThreadSettingsPatchSchema>;

export const ThreadSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  task_ids: z.array(z.string()),
  mode: z.enum(THREAD_MODES),
  settings: ThreadSettingsSchema,
  created_at: z.string(),
  updated_at: z.string(),
});

export const ThreadDocumentSchema = z.object({
  threads: z.array(ThreadSchema),
});
export type ThreadDocument = z.infer<typeof ThreadDocumentSchema>;

export const CreateThreadInputSchema = z.object({
  title: z.string().trim().min(1).max(200).default('New Thread'),
});

export const SetModeInputSchema = z.object({
  mode: z.enum(THREAD_MODES),
});

export type ThreadChange = 'created' | 'updated' | 'deleted';
