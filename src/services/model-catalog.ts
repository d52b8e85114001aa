import { ValidationError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../middleware/logger.js';
import type { ModelCatalogSettings } from '../config.js';
import type { ModelEntry, ModelListResponse } from '../schemas/request.js';

const LISTED_MODEL_CREATED = 1677610602;

/**
 * Which model names callers may ask for and what they are renamed to before the
 * request reaches the provider.
 */
export class ModelCatalog {
  private readonly available: Set<string>;

  constructor(private readonly settings: ModelCatalogSettings, private readonly log: Logger = rootLogger) {
    this.available = new Set(settings.availableModels);
  }

  isAvailable(model: string): boolean {
    return this.available.has(model);
  }

  mapped(model: string): string {
    return this.settings.modelMappings[model] ?? model;
  }

  /** Throws when validation is on and the model is neither listed, mapped to a listed model, nor allowed as unknown. */
  validate(model: string): void {
    if (!this.settings.validateModels || this.isAvailable(model)) {
      return;
    }

    const target = this.mapped(model);
    if (target !== model && this.isAvailable(target)) {
      return;
    }

    if (this.settings.allowUnknownModels) {
      this.log.warn({ model }, 'Unknown model requested but allowed');
      return;
    }

    throw new ValidationError(
      `Model '${model}' is not available. Available models: ${this.settings.availableModels.join(', ')}`,
      'model'
    );
  }

  /** Validates, then applies the alias mapping. */
  resolve(model: string): string {
    this.validate(model);

    const target = this.mapped(model);
    if (target !== model) {
      this.log.info({ originalModel: model, mappedModel: target }, 'Model mapping applied');
    }
    return target;
  }

  list(ownedBy = 'openai'): ModelListResponse {
    const data: ModelEntry[] = this.settings.availableModels.map((id) => ({
      id,
      object: 'model',
      created: LISTED_MODEL_CREATED,
      owned_by: ownedBy,
    }));
    return { object: 'list', data };
  }
}
