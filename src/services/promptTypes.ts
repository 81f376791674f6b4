import { z } from 'zod';

export const PromptConfigEntrySchema = z.object({
  inputs: z.array(z.string()).default([]),
  path: z.string().min(1),
});

export const FullPromptsConfigSchema = z.object({
  prompts: z.record(z.record(PromptConfigEntrySchema)),
});

export type PromptConfigEntry = z.infer<typeof PromptConfigEntrySchema>;

export type FullPromptsConfig = z.infer<typeof FullPromptsConfigSchema>;

export type PromptContext = Record<string, string | number>;
