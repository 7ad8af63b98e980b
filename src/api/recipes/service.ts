/**
 * Recipe service: validation, id assignment and error translation
 * between the HTTP routes and the configured storage backend.
 */

import { randomUUID } from 'node:crypto';
import type { ZodError } from 'zod';
import { createLogger, type Logger } from '../../logger.ts';
import {
  RecipeAlreadyExistsError,
  RecipeNotFoundError,
  RecipeServiceError,
  RecipeStorageError,
  type ValidationIssue,
} from './errors.ts';
import { isValidRecipeId, RecipeInputSchema } from './schema.ts';
import type { RecipeStorage } from './storage/types.ts';
import type { ListRecipesResult, OperationOptions, Recipe, RecipeInput } from './types.ts';

export interface RecipeServiceOptions {
  logger?: Logger;
  /** Id generator for new recipes; random UUIDs by default */
  generateId?: () => string;
}

function toIssues(error: ZodError): ValidationIssue[] {
  return error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates an untrusted payload against the strict recipe schema.
 * @throws RecipeServiceError with code VALIDATION_ERROR
 */
export function validateRecipe(payload: unknown): RecipeInput {
  const result = RecipeInputSchema.safeParse(payload);
  if (!result.success) {
    const details = toIssues(result.error);
    throw new RecipeServiceError(
      'VALIDATION_ERROR',
      `Invalid recipe: ${details.map((d) => (d.path ? `${d.path}: ${d.message}` : d.message)).join(', ')}`,
      details,
    );
  }
  return result.data;
}

export class RecipeService {
  private readonly logger: Logger;
  private readonly generateId: () => string;

  constructor(
    private readonly storage: RecipeStorage,
    options: RecipeServiceOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('recipes:service');
    this.generateId = options.generateId ?? randomUUID;
  }

  get backend(): string {
    return this.storage.backend;
  }

  /** Initialises the backend; failures propagate and are fatal at startup */
  async start(): Promise<void> {
    await this.storage.start();
    this.logger.info('Recipe storage started', { backend: this.storage.backend });
  }

  async stop(): Promise<void> {
    await this.storage.stop();
    this.logger.info('Recipe storage stopped', { backend: this.storage.backend });
  }

  async createRecipe(payload: unknown, options: OperationOptions = {}): Promise<Recipe> {
    const input = validateRecipe(payload);
    const id = this.generateId();
    const recipe = await this.call('create', id, () => this.storage.create(input, { id, signal: options.signal }));
    this.logger.debug('Recipe created', { id });
    return recipe;
  }

  async getRecipe(id: string, options: OperationOptions = {}): Promise<Recipe> {
    this.requireValidId(id);
    return this.call('get', id, () => this.storage.get(id, options));
  }

  async listRecipes(options: OperationOptions = {}): Promise<ListRecipesResult> {
    const recipes = await this.call('list', undefined, () => this.storage.list(options));
    return { recipes, total: recipes.length };
  }

  /**
   * Full replacement. The payload may repeat the recipe's own id; any other id is rejected.
   */
  async updateRecipe(id: string, payload: unknown, options: OperationOptions = {}): Promise<Recipe> {
    this.requireValidId(id);

    let body = payload;
    if (isRecord(payload) && 'id' in payload) {
      const { id: payloadId, ...rest } = payload;
      if (payloadId !== id) {
        throw new RecipeServiceError('VALIDATION_ERROR', 'Invalid recipe: id: does not match the recipe being updated', [
          { path: 'id', message: 'does not match the recipe being updated' },
        ]);
      }
      body = rest;
    }

    const input = validateRecipe(body);
    const recipe = await this.call('update', id, () => this.storage.update(id, input, options));
    this.logger.debug('Recipe updated', { id });
    return recipe;
  }

  async deleteRecipe(id: string, options: OperationOptions = {}): Promise<void> {
    this.requireValidId(id);
    await this.call('delete', id, () => this.storage.delete(id, options));
    this.logger.debug('Recipe deleted', { id });
  }

  /** Removes every recipe. Not exposed over HTTP. */
  async clearRecipes(options: OperationOptions = {}): Promise<void> {
    await this.call('clear', undefined, () => this.storage.clear(options));
    this.logger.warn('All recipes removed', { backend: this.storage.backend });
  }

  /** Readiness probe for the health registry */
  async ping(): Promise<void> {
    await this.storage.ping();
  }

  private requireValidId(id: string): void {
    if (!isValidRecipeId(id)) {
      throw new RecipeServiceError('NOT_FOUND', `Recipe not found: ${id}`);
    }
  }

  /**
   * Runs a storage call and maps its failure to a caller-visible error.
   * Backend error text goes to the log only.
   */
  private async call<T>(operation: string, id: string | undefined, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof RecipeNotFoundError) {
        throw new RecipeServiceError('NOT_FOUND', `Recipe not found: ${error.recipeId}`);
      }
      if (error instanceof RecipeAlreadyExistsError) {
        throw new RecipeServiceError('ALREADY_EXISTS', `Recipe already exists: ${error.recipeId}`);
      }

      this.logger.error('Recipe storage operation failed', {
        operation,
        id,
        backend: error instanceof RecipeStorageError ? error.backend : this.storage.backend,
        error,
        cause: error instanceof Error ? error.cause : undefined,
      });
      throw new RecipeServiceError('STORAGE_ERROR', 'Recipe storage is unavailable');
    }
  }
}
