import { z } from 'zod';
import { JsonValueSchema } from '../../core/utils/json.js';

/** `[Domain]_[Action]_[Object]`, each part capitalized. */
export const TOOL_NAME_PATTERN = /^[A-Z][A-Za-z0-9]*_[A-Z][A-Za-z0-9]*_[A-Z][A-Za-z0-9]*$/;

export const ToolParameterSchema = z.object({
  type: z.string(),
  description: z.string().optional(),
  default: JsonValueSchema.optional(),
  required: z.boolean().optional(),
});
export type ToolParameter = z.infer<typeof ToolParameterSchema>;

export const ToolSchema = z.object({
  name: z.string().regex(TOOL_NAME_PATTERN),
  domain: z.string(),
  description: z.string(),
  parameters: z.record(z.string(), ToolParameterSchema),
  usage_count: z.number().int().nonnegative(),
  is_system: z.boolean(),
  created_at: z.string(),
  last_used_at: z.string().nullable(),
  file_path: z.string().nullable(),
});
export type Tool = z.infer<typeof ToolSchema>;

export const ToolDocumentSchema = z.object({
  tools: z.array(ToolSchema),
});
export type ToolDocument = z.infer<typeof ToolDocumentSchema>;

export const SystemToolSeedSchema = z.array(z.object({
  name: z.string().regex(TOOL_NAME_PATTERN),
  domain: z.string(),
  description: z.string(),
  parameters: z.record(z.string(), ToolParameterSchema).default({}),
}));

export const RegisterToolInputSchema = z.object({
  name: z.string().regex(TOOL_NAME_PATTERN, 'Tool name must follow [Domain]_[Action]_[Object]'),
  domain: z.string().optional(),
  description: z.string().default(''),
  parameters: z.record(z.string(), ToolParameterSchema).default({}),
  file_path: z.string().nullable().default(null),
});
export type RegisterToolInput = z.infer<typeof RegisterToolInputSchema>;
