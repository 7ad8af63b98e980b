/**
 * Process-local recipe storage. Nothing survives a restart.
 * List order is insertion order.
 */

import { randomUUID } from 'node:crypto';
import { RecipeAlreadyExistsError, RecipeNotFoundError, throwIfAborted } from '../errors.ts';
import type { CreateOptions, OperationOptions, Recipe, RecipeInput } from '../types.ts';
import { Mutex } from './lock.ts';
import { toRecipe, type RecipeStorage } from './types.ts';

export class MemoryRecipeStorage implements RecipeStorage {
  readonly backend = 'memory' as const;

  private readonly records = new Map<string, Recipe>();
  private readonly mutex = new Mutex();

  async start(): Promise<void> {}

  async stop(): Promise<void> {}

  async ping(): Promise<void> {}

  create(input: RecipeInput, options: CreateOptions = {}): Promise<Recipe> {
    return this.mutex.runExclusive(() => {
      throwIfAborted(options.signal, this.backend);
      const id = options.id ?? randomUUID();
      if (this.records.has(id)) {
        throw new RecipeAlreadyExistsError(id);
      }
      const recipe = toRecipe(id, input);
      this.records.set(id, recipe);
      return toRecipe(id, recipe);
    });
  }

  get(id: string, options: OperationOptions = {}): Promise<Recipe> {
    return this.mutex.runExclusive(() => {
      throwIfAborted(options.signal, this.backend);
      return toRecipe(id, this.require(id));
    });
  }

  list(options: OperationOptions = {}): Promise<Recipe[]> {
    return this.mutex.runExclusive(() => {
      throwIfAborted(options.signal, this.backend);
      return [...this.records.values()].map((recipe) => toRecipe(recipe.id, recipe));
    });
  }

  update(id: string, input: RecipeInput, options: OperationOptions = {}): Promise<Recipe> {
    return this.mutex.runExclusive(() => {
      throwIfAborted(options.signal, this.backend);
      this.require(id);
      const recipe = toRecipe(id, input);
      this.records.set(id, recipe);
      return toRecipe(id, recipe);
    });
  }

  delete(id: string, options: OperationOptions = {}): Promise<void> {
    return this.mutex.runExclusive(() => {
      throwIfAborted(options.signal, this.backend);
      this.require(id);
      this.records.delete(id);
    });
  }

  clear(options: OperationOptions = {}): Promise<void> {
    return this.mutex.runExclusive(() => {
      throwIfAborted(options.signal, this.backend);
      this.records.clear();
    });
  }

  private require(id: string): Recipe {
    const recipe = this.records.get(id);
    if (!recipe) {
      throw new RecipeNotFoundError(id);
    }
    return recipe;
  }
}
