export { AnthropicAdapter, AnthropicStreamInterpreter } from './anthropic.js';
export { BaseAdapter, FALLBACK_MESSAGE } from './base.js';
export type { AdapterDeps, DispatchOptions, Endpoint, ModelInfo, ProviderAdapter } from './base.js';
export { CozeAdapter, CozeStreamInterpreter, deriveBotId } from './coze.js';
export { GoogleAdapter } from './google.js';
export { OpenAIAdapter, OpenAIStreamInterpreter } from './openai.js';
export { AdapterRegistry, createDefaultRegistry } from './registry.js';
export type { AdapterFactory } from './registry.js';
