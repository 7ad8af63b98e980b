/**
 * PostgreSQL recipe storage.
 *
 * One row per recipe in `recipe_entries`. Ingredients and instructions are
 * jsonb arrays; nutrition is flattened into serving_size and calories.
 * Every storage call runs as one transaction on a pooled client that is
 * always released. List order is created_at, then id.
 */

import { randomUUID } from 'node:crypto';
import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { createLogger, type Logger } from '../../../logger.ts';
import {
  RecipeAlreadyExistsError,
  RecipeNotFoundError,
  RecipeStorageError,
  RecipeStorageFailure,
  throwIfAborted,
} from '../errors.ts';
import type { CreateOptions, OperationOptions, Recipe, RecipeInput } from '../types.ts';
import type { RecipeStorage } from './types.ts';

// PostgreSQL error codes
const PG_UNIQUE_VIOLATION = '23505';

export const RECIPE_TABLE = 'recipe_entries';

export const CREATE_TABLE_SQL = `CREATE TABLE IF NOT EXISTS ${RECIPE_TABLE} (
  id text PRIMARY KEY,
  name text NOT NULL,
  date_published text NOT NULL,
  description varchar(500) NOT NULL,
  rating double precision,
  prep_time text NOT NULL,
  cook_time text NOT NULL,
  ingredients jsonb NOT NULL,
  instructions jsonb NOT NULL,
  serving_size text NOT NULL,
  calories double precision NOT NULL,
  created_at timestamptz NOT NULL DEFAULT now(),
  updated_at timestamptz NOT NULL DEFAULT now()
)`;

const RECIPE_COLUMNS = `id, name, date_published, description, rating, prep_time, cook_time,
  ingredients, instructions, serving_size, calories`;

/** A recipe_entries row as returned by the driver */
export interface RecipeRow {
  id: string;
  name: string;
  date_published: string;
  description: string;
  rating: number | null;
  prep_time: string;
  cook_time: string;
  ingredients: string[];
  instructions: string[];
  serving_size: string;
  calories: number;
}

/**
 * Maps a database row to a Recipe
 */
export function mapRowToRecipe(row: RecipeRow): Recipe {
  const recipe: Recipe = {
    id: row.id,
    name: row.name,
    datePublished: row.date_published,
    description: row.description,
    prepTime: row.prep_time,
    cookTime: row.cook_time,
    ingredients: row.ingredients,
    instructions: row.instructions,
    nutrition: { servingSize: row.serving_size, calories: Number(row.calories) },
  };
  if (row.rating !== null) {
    recipe.rating = Number(row.rating);
  }
  return recipe;
}

/**
 * Column values for INSERT/UPDATE, in RECIPE_COLUMNS order after id.
 */
function recipeValues(input: RecipeInput): unknown[] {
  return [
    input.name,
    input.datePublished,
    input.description,
    input.rating ?? null,
    input.prepTime,
    input.cookTime,
    JSON.stringify(input.ingredients),
    JSON.stringify(input.instructions),
    input.nutrition.servingSize,
    input.nutrition.calories,
  ];
}

function pgErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export interface SqlRecipeStorageOptions {
  logger?: Logger;
  /** End the pool on stop(); true when the storage created the pool */
  ownsPool?: boolean;
}

export class SqlRecipeStorage implements RecipeStorage {
  readonly backend = 'sql' as const;

  private readonly logger: Logger;
  private readonly ownsPool: boolean;

  constructor(
    private readonly pool: Pool,
    options: SqlRecipeStorageOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('recipes:sql');
    this.ownsPool = options.ownsPool ?? true;
  }

  async start(): Promise<void> {
    await this.ping();
    await this.transaction('create recipe table', undefined, async (client) => {
      await client.query(CREATE_TABLE_SQL);
    });
    this.logger.info('Recipe table ready', { table: RECIPE_TABLE });
  }

  async stop(): Promise<void> {
    if (this.ownsPool) {
      await this.pool.end();
    }
  }

  async ping(): Promise<void> {
    try {
      await this.pool.query('SELECT 1');
    } catch (error) {
      throw new RecipeStorageError('Database connection failed', this.backend, { cause: error });
    }
  }

  async create(input: RecipeInput, options: CreateOptions = {}): Promise<Recipe> {
    const id = options.id ?? randomUUID();
    return this.transaction(`create recipe ${id}`, options.signal, async (client) => {
      const result = await this.query<RecipeRow>(
        client,
        options.signal,
        `INSERT INTO ${RECIPE_TABLE} (${RECIPE_COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9::jsonb, $10, $11)
         RETURNING ${RECIPE_COLUMNS}`,
        [id, ...recipeValues(input)],
      );
      return mapRowToRecipe(result.rows[0]);
    }, id);
  }

  async get(id: string, options: OperationOptions = {}): Promise<Recipe> {
    return this.transaction(`read recipe ${id}`, options.signal, async (client) => {
      const result = await this.query<RecipeRow>(
        client,
        options.signal,
        `SELECT ${RECIPE_COLUMNS} FROM ${RECIPE_TABLE} WHERE id = $1`,
        [id],
      );
      if (result.rows.length === 0) {
        throw new RecipeNotFoundError(id);
      }
      return mapRowToRecipe(result.rows[0]);
    });
  }

  async list(options: OperationOptions = {}): Promise<Recipe[]> {
    return this.transaction('list recipes', options.signal, async (client) => {
      const result = await this.query<RecipeRow>(
        client,
        options.signal,
        `SELECT ${RECIPE_COLUMNS} FROM ${RECIPE_TABLE} ORDER BY created_at ASC, id ASC`,
      );
      return result.rows.map(mapRowToRecipe);
    });
  }

  async update(id: string, input: RecipeInput, options: OperationOptions = {}): Promise<Recipe> {
    return this.transaction(`update recipe ${id}`, options.signal, async (client) => {
      const result = await this.query<RecipeRow>(
        client,
        options.signal,
        `UPDATE ${RECIPE_TABLE} SET
           name = $2,
           date_published = $3,
           description = $4,
           rating = $5,
           prep_time = $6,
           cook_time = $7,
           ingredients = $8::jsonb,
           instructions = $9::jsonb,
           serving_size = $10,
           calories = $11,
           updated_at = now()
         WHERE id = $1
         RETURNING ${RECIPE_COLUMNS}`,
        [id, ...recipeValues(input)],
      );
      if (result.rows.length === 0) {
        throw new RecipeNotFoundError(id);
      }
      return mapRowToRecipe(result.rows[0]);
    });
  }

  async delete(id: string, options: OperationOptions = {}): Promise<void> {
    await this.transaction(`delete recipe ${id}`, options.signal, async (client) => {
      const result = await this.query(client, options.signal, `DELETE FROM ${RECIPE_TABLE} WHERE id = $1`, [id]);
      if ((result.rowCount ?? 0) === 0) {
        throw new RecipeNotFoundError(id);
      }
    });
  }

  async clear(options: OperationOptions = {}): Promise<void> {
    await this.transaction('clear recipes', options.signal, async (client) => {
      await this.query(client, options.signal, `DELETE FROM ${RECIPE_TABLE}`);
    });
  }

  private async query<R extends QueryResultRow = QueryResultRow>(
    client: PoolClient,
    signal: AbortSignal | undefined,
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>> {
    throwIfAborted(signal, this.backend);
    return client.query<R>(text, values);
  }

  /**
   * Runs `fn` inside BEGIN/COMMIT on a dedicated client.
   * Any failure rolls back and is translated into the storage error taxonomy.
   */
  private async transaction<T>(
    action: string,
    signal: AbortSignal | undefined,
    fn: (client: PoolClient) => Promise<T>,
    recipeId?: string,
  ): Promise<T> {
    throwIfAborted(signal, this.backend);

    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new RecipeStorageError('Failed to acquire database connection', this.backend, { cause: error });
    }

    let broken: Error | undefined;
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        this.logger.warn('Rollback failed; discarding connection', { action, error: broken });
      }
      throw this.translate(error, action, recipeId);
    } finally {
      client.release(broken);
    }
  }

  private translate(error: unknown, action: string, recipeId?: string): RecipeStorageFailure {
    if (error instanceof RecipeStorageFailure) {
      return error;
    }
    if (recipeId !== undefined && pgErrorCode(error) === PG_UNIQUE_VIOLATION) {
      return new RecipeAlreadyExistsError(recipeId);
    }
    return new RecipeStorageError(`Failed to ${action}`, this.backend, { cause: error });
  }
}
