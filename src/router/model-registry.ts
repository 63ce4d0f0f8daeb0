import fs from 'node:fs';
import { z } from 'zod';
import type { ModelSpec } from './types.js';
import { modelSpecSchema } from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('model-registry');

const catalogSchema = z.object({
  models: z.array(modelSpecSchema).min(1),
});

/**
 * Read-only snapshot of the configured models. The router never mutates it;
 * reconfiguration means building a new registry.
 */
export class ModelRegistry {
  private readonly models: Map<string, ModelSpec>;

  constructor(models: readonly ModelSpec[]) {
    this.models = new Map();
    for (const model of models) {
      if (this.models.has(model.id)) {
        throw new Error(`Duplicate model ID in catalog: ${model.id}`);
      }
      this.models.set(model.id, model);
    }
  }

  static fromFile(catalogPath: string): ModelRegistry {
    const raw: unknown = JSON.parse(fs.readFileSync(catalogPath, 'utf-8'));
    const catalog = catalogSchema.parse(raw);
    const registry = new ModelRegistry(catalog.models);
    log.info(`Loaded ${registry.size} models from catalog`);
    return registry;
  }

  getById(id: string): ModelSpec {
    const model = this.models.get(id);
    if (!model) {
      throw new Error(`Unknown model ID: ${id}`);
    }
    return model;
  }

  find(id: string): ModelSpec | undefined {
    return this.models.get(id);
  }

  getAll(): ModelSpec[] {
    return Array.from(this.models.values());
  }

  /**
   * Models carrying every listed capability, in catalog order. An empty list
   * matches every model.
   */
  withCapabilities(required: readonly string[]): ModelSpec[] {
    if (required.length === 0) return this.getAll();
    return this.getAll().filter(model => required.every(cap => model.capabilities.includes(cap)));
  }

  get size(): number {
    return this.models.size;
  }
}
