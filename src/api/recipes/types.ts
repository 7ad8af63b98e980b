/**
 * Recipe types.
 *
 * Property names follow the schema.org Recipe vocabulary (camelCase).
 */

import type { z } from 'zod';
import type { NutritionSchema, RecipeInputSchema } from './schema.ts';

export type Nutrition = z.infer<typeof NutritionSchema>;

/** A recipe payload as sent by callers: every field except the id */
export type RecipeInput = z.infer<typeof RecipeInputSchema>;

/** A persisted recipe */
export interface Recipe extends RecipeInput {
  id: string;
}

/** Per-call options accepted by every storage and service operation */
export interface OperationOptions {
  /** Aborts the operation before further storage work is done */
  signal?: AbortSignal;
}

export interface CreateOptions extends OperationOptions {
  /** Id to persist under; the backend assigns one when absent */
  id?: string;
}

/** Result of listing recipes */
export interface ListRecipesResult {
  recipes: Recipe[];
  total: number;
}
