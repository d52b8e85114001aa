import { ProviderTypeSchema, type ProviderConfig, type ProviderType } from '../schemas/config.js';
import { logger as rootLogger, type Logger } from '../middleware/logger.js';
import { AnthropicAdapter } from './anthropic.js';
import type { AdapterDeps, ProviderAdapter } from './base.js';
import { CozeAdapter } from './coze.js';
import { GoogleAdapter } from './google.js';
import { OpenAIAdapter } from './openai.js';

export type AdapterFactory = (config: ProviderConfig, deps: AdapterDeps) => ProviderAdapter;

/** Maps provider types to adapter constructors. */
export class AdapterRegistry {
  private readonly factories = new Map<ProviderType, AdapterFactory>();
  private readonly log: Logger;

  constructor(private readonly deps: AdapterDeps = {}) {
    this.log = deps.logger ?? rootLogger;
  }

  register(type: ProviderType, factory: AdapterFactory): this {
    this.factories.set(type, factory);
    this.log.debug({ platform: type }, 'Registered platform adapter');
    return this;
  }

  /** Null when the type has no adapter or the configuration does not validate. */
  create(type: ProviderType, config: ProviderConfig): ProviderAdapter | null {
    const factory = this.factories.get(type);
    if (!factory) {
      this.log.error({ platform: type }, 'Unsupported platform');
      return null;
    }

    const adapter = factory(config, this.deps);
    if (!adapter.validateConfig()) {
      this.log.error({ platform: type }, 'Invalid platform configuration');
      return null;
    }

    return adapter;
  }

  isSupported(type: string): boolean {
    const parsed = ProviderTypeSchema.safeParse(type);
    return parsed.success && this.factories.has(parsed.data);
  }

  listPlatforms(): ProviderType[] {
    return [...this.factories.keys()];
  }
}

export function createDefaultRegistry(deps: AdapterDeps = {}): AdapterRegistry {
  const openai: AdapterFactory = (config, adapterDeps) => new OpenAIAdapter(config, adapterDeps);

  return new AdapterRegistry(deps)
    .register('openai', openai)
    .register('azure_openai', openai)
    .register('custom', openai)
    .register('anthropic', (config, adapterDeps) => new AnthropicAdapter(config, adapterDeps))
    .register('google', (config, adapterDeps) => new GoogleAdapter(config, adapterDeps))
    .register('coze', (config, adapterDeps) => new CozeAdapter(config, adapterDeps));
}
