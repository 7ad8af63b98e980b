import type { CreateOptions, OperationOptions, Recipe, RecipeInput } from '../types.ts';

export type StorageBackendName = 'memory' | 'fs' | 'sql';

/**
 * Backend-agnostic recipe storage contract.
 *
 * Every implementation must behave identically to callers:
 * - create fails with RecipeAlreadyExistsError on an id collision
 * - get, update and delete fail with RecipeNotFoundError for unknown ids
 * - I/O failures surface as RecipeStorageError, never swallowed
 * - no caller observes a partially written recipe
 * - returned recipes are copies of the stored record
 */
export interface RecipeStorage {
  readonly backend: StorageBackendName;

  /** Idempotent initialisation (directories, schema, connectivity). Failure is fatal. */
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Readiness probe; throws RecipeStorageError when the backend is unusable */
  ping(): Promise<void>;

  create(recipe: RecipeInput, options?: CreateOptions): Promise<Recipe>;
  get(id: string, options?: OperationOptions): Promise<Recipe>;
  /** Every stored recipe, in backend-defined order */
  list(options?: OperationOptions): Promise<Recipe[]>;
  /** Full replacement; fields absent from `recipe` are not preserved */
  update(id: string, recipe: RecipeInput, options?: OperationOptions): Promise<Recipe>;
  delete(id: string, options?: OperationOptions): Promise<void>;
  /** Removes every recipe */
  clear(options?: OperationOptions): Promise<void>;
}

/**
 * Builds the stored form of a recipe: id first, rating only when present.
 */
export function toRecipe(id: string, input: RecipeInput): Recipe {
  const recipe: Recipe = {
    id,
    name: input.name,
    datePublished: input.datePublished,
    description: input.description,
    prepTime: input.prepTime,
    cookTime: input.cookTime,
    ingredients: [...input.ingredients],
    instructions: [...input.instructions],
    nutrition: { servingSize: input.nutrition.servingSize, calories: input.nutrition.calories },
  };
  if (input.rating !== undefined) {
    recipe.rating = input.rating;
  }
  return recipe;
}
