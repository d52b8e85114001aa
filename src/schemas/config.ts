import { z } from 'zod';

export const ProviderTypeSchema = z.enum([
  'openai',
  'anthropic',
  'google',
  'azure_openai',
  'cohere',
  'coze',
  'custom',
]);

export type ProviderType = z.infer<typeof ProviderTypeSchema>;

export const ProviderConfigSchema = z.object({
  type: ProviderTypeSchema,
  apiKey: z.string().default(''),
  baseUrl: z.string().default(''),
  timeoutMs: z.number().int().positive().default(300_000),
  enabled: z.boolean().default(true),
  actualModelName: z.string().optional(),
  botId: z.string().optional(),
  defaultHeaders: z.record(z.string()).default({}),
});

/** Fully-populated provider configuration, as held by the adapter manager. */
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

/** Provider configuration as callers write it; defaults fill the rest. */
export type ProviderConfigInput = z.input<typeof ProviderConfigSchema>;

export const DEFAULT_BASE_URLS: Record<ProviderType, string> = {
  openai: 'https://api.openai.com/v1',
  azure_openai: '',
  anthropic: 'https://api.anthropic.com/v1',
  google: 'https://generativelanguage.googleapis.com/v1beta',
  cohere: 'https://api.cohere.ai/v1',
  coze: 'https://api.coze.com',
  custom: '',
};
