import { type BpeTokenizer, LRUCache, ModelNotFoundError, info, mergeTableHash, warn } from '@bytepair/core';

export interface RegisteredModel {
  tokenizer: BpeTokenizer;
  createdAt: string;
}

/**
 * In-memory models keyed by the sha256 of their merge table.
 * Holds at most `maxModels`; the least recently used model is evicted and disposed.
 */
export class ModelRegistry {
  private readonly models: LRUCache<string, RegisteredModel>;

  constructor(maxModels: number) {
    this.models = new LRUCache(maxModels, (id, model) => {
      model.tokenizer.dispose();
      warn('model evicted', { id, maxModels });
    });
  }

  get size(): number {
    return this.models.size;
  }

  register(tokenizer: BpeTokenizer): { id: string; isNew: boolean } {
    const id = mergeTableHash(tokenizer.mergeTable);
    if (this.models.get(id)) return { id, isNew: false };

    this.models.set(id, { tokenizer, createdAt: new Date().toISOString() });
    info('model registered', { id, merges: tokenizer.mergeTable.size });
    return { id, isNew: true };
  }

  /** @throws {ModelNotFoundError} If no model has this id */
  lookup(id: string): RegisteredModel {
    const model = this.models.get(id);
    if (!model) throw new ModelNotFoundError(id, this.ids());
    return model;
  }

  /** @throws {ModelNotFoundError} If no model has this id */
  remove(id: string): void {
    const model = this.lookup(id);
    this.models.delete(id);
    model.tokenizer.dispose();
    info('model removed', { id });
  }

  ids(): string[] {
    return [...this.models.entries()].map(([id]) => id);
  }

  /** Models from least to most recently used. */
  list(): Array<[string, RegisteredModel]> {
    return [...this.models.entries()];
  }

  clear(): void {
    for (const [, model] of this.models.entries()) model.tokenizer.dispose();
    this.models.clear();
  }
}
