import { z } from 'zod';
import {
  DEFAULT_BASE_URLS,
  ProviderConfigSchema,
  ProviderTypeSchema,
  type ProviderConfig,
} from './schemas/config.js';

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform((value) => (value === undefined ? fallback : ['true', '1', 'yes'].includes(value)));

const jsonRecord = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (!value || !value.trim()) return {};
    try {
      return z.record(z.string()).parse(JSON.parse(value));
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a JSON object of strings' });
      return z.NEVER;
    }
  });

const commaList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

const EnvSchema = z.object({
  PORT: z.coerce.number().int().nonnegative().default(3000),
  HOST: z.string().default('0.0.0.0'),
  PROVIDER_TYPE: ProviderTypeSchema.default('openai'),
  PROVIDER_API_KEY: z.string().default(''),
  PROVIDER_BASE_URL: z.string().optional(),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  PROVIDER_ENABLED: booleanFlag(true),
  PROVIDER_ACTUAL_MODEL: z.string().optional(),
  PROVIDER_DEFAULT_HEADERS: jsonRecord,
  COZE_BOT_ID: z.string().optional(),
  AVAILABLE_MODELS: commaList,
  MODEL_MAPPINGS: jsonRecord,
  VALIDATE_MODELS: booleanFlag(false),
  ALLOW_UNKNOWN_MODELS: booleanFlag(true),
  GATEWAY_API_KEYS: commaList,
});

export interface ModelCatalogSettings {
  availableModels: string[];
  modelMappings: Record<string, string>;
  validateModels: boolean;
  allowUnknownModels: boolean;
}

export interface GatewayConfig {
  port: number;
  host: string;
  provider: ProviderConfig;
  models: ModelCatalogSettings;
  clientApiKeys: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = EnvSchema.parse(env);

  const provider = ProviderConfigSchema.parse({
    type: parsed.PROVIDER_TYPE,
    apiKey: parsed.PROVIDER_API_KEY,
    baseUrl: parsed.PROVIDER_BASE_URL ?? DEFAULT_BASE_URLS[parsed.PROVIDER_TYPE],
    timeoutMs: parsed.PROVIDER_TIMEOUT_MS,
    enabled: parsed.PROVIDER_ENABLED,
    actualModelName: parsed.PROVIDER_ACTUAL_MODEL,
    botId: parsed.COZE_BOT_ID,
    defaultHeaders: parsed.PROVIDER_DEFAULT_HEADERS,
  });

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    provider,
    models: {
      availableModels: parsed.AVAILABLE_MODELS,
      modelMappings: parsed.MODEL_MAPPINGS,
      validateModels: parsed.VALIDATE_MODELS,
      allowUnknownModels: parsed.ALLOW_UNKNOWN_MODELS,
    },
    clientApiKeys: parsed.GATEWAY_API_KEYS,
  };
}
