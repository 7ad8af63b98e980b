/**
 * Tests for the PostgreSQL recipe backend against a mocked pg pool.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Pool, PoolClient } from 'pg';
import { makeRecipeInput } from '../../../../tests/helpers/recipes.ts';
import { createLogger } from '../../../logger.ts';
import { RecipeAlreadyExistsError, RecipeNotFoundError, RecipeStorageError } from '../errors.ts';
import { CREATE_TABLE_SQL, mapRowToRecipe, SqlRecipeStorage, type RecipeRow } from './sql.ts';

const silent = createLogger('test', { level: 'silent' });

function makeRow(overrides: Partial<RecipeRow> = {}): RecipeRow {
  return {
    id: 'recipe-1',
    name: 'Lemon Rice',
    date_published: '2022-05-01',
    description: 'Bright weeknight rice with lemon and curry leaves.',
    rating: 4.5,
    prep_time: '00:10',
    cook_time: '00:20',
    ingredients: ['1 cup basmati rice', '1 lemon', '8 curry leaves'],
    instructions: ['Cook the rice.', 'Temper the spices.', 'Fold in lemon juice.'],
    serving_size: '1 bowl',
    calories: 320,
    ...overrides,
  };
}

type QueryResponder = (text: string, values?: unknown[]) => { rows: unknown[]; rowCount: number } | Error;

/**
 * A pool whose client answers BEGIN/COMMIT/ROLLBACK itself and forwards
 * every other statement to `respond`.
 */
function mockPool(respond: QueryResponder) {
  const clientQuery = vi.fn(async (text: string, values?: unknown[]) => {
    if (text === 'BEGIN' || text === 'COMMIT' || text === 'ROLLBACK') {
      return { rows: [], rowCount: 0 };
    }
    const result = respond(text, values);
    if (result instanceof Error) throw result;
    return result;
  });
  const client = { query: clientQuery, release: vi.fn() };
  const pool = {
    query: vi.fn().mockResolvedValue({ rows: [{ '?column?': 1 }], rowCount: 1 }),
    connect: vi.fn().mockResolvedValue(client as unknown as PoolClient),
    end: vi.fn().mockResolvedValue(undefined),
  };
  return { pool, client, storage: new SqlRecipeStorage(pool as unknown as Pool, { logger: silent }) };
}

function statements(client: { query: ReturnType<typeof vi.fn> }): string[] {
  return client.query.mock.calls.map((call) => String(call[0]).trim().split(/\s+/).slice(0, 2).join(' '));
}

describe('mapRowToRecipe', () => {
  it('maps columns to recipe fields', () => {
    expect(mapRowToRecipe(makeRow())).toEqual({ id: 'recipe-1', ...makeRecipeInput() });
  });

  it('omits a null rating', () => {
    expect(mapRowToRecipe(makeRow({ rating: null }))).not.toHaveProperty('rating');
  });
});

describe('SqlRecipeStorage', () => {
  let harness: ReturnType<typeof mockPool>;

  describe('start', () => {
    beforeEach(() => {
      harness = mockPool(() => ({ rows: [], rowCount: 0 }));
    });

    it('checks connectivity then creates the table idempotently in a transaction', async () => {
      await harness.storage.start();

      expect(harness.pool.query).toHaveBeenCalledWith('SELECT 1');
      expect(harness.client.query).toHaveBeenCalledWith(CREATE_TABLE_SQL);
      expect(CREATE_TABLE_SQL).toContain('CREATE TABLE IF NOT EXISTS recipe_entries');
      expect(statements(harness.client)).toEqual(['BEGIN', 'CREATE TABLE', 'COMMIT']);
      expect(harness.client.release).toHaveBeenCalledTimes(1);
    });

    it('fails with a storage error when the database is unreachable', async () => {
      harness.pool.query.mockRejectedValueOnce(new Error('ECONNREFUSED'));

      await expect(harness.storage.start()).rejects.toBeInstanceOf(RecipeStorageError);
      expect(harness.pool.connect).not.toHaveBeenCalled();
    });
  });

  it('inserts with the given id and returns the stored row', async () => {
    harness = mockPool((text) => ({ rows: [makeRow()], rowCount: text.startsWith('INSERT') ? 1 : 0 }));

    const created = await harness.storage.create(makeRecipeInput(), { id: 'recipe-1' });

    expect(created).toEqual({ id: 'recipe-1', ...makeRecipeInput() });
    expect(statements(harness.client)).toEqual(['BEGIN', 'INSERT INTO', 'COMMIT']);
    const insertValues = harness.client.query.mock.calls[1][1];
    expect(insertValues).toEqual([
      'recipe-1',
      'Lemon Rice',
      '2022-05-01',
      'Bright weeknight rice with lemon and curry leaves.',
      4.5,
      '00:10',
      '00:20',
      '["1 cup basmati rice","1 lemon","8 curry leaves"]',
      '["Cook the rice.","Temper the spices.","Fold in lemon juice."]',
      '1 bowl',
      320,
    ]);
    expect(harness.client.release).toHaveBeenCalledWith(undefined);
  });

  it('stores a missing rating as NULL', async () => {
    harness = mockPool(() => ({ rows: [makeRow({ rating: null })], rowCount: 1 }));
    const { rating: _rating, ...withoutRating } = makeRecipeInput();

    const created = await harness.storage.create(withoutRating, { id: 'recipe-1' });

    expect(harness.client.query.mock.calls[1][1]?.[4]).toBeNull();
    expect(created).not.toHaveProperty('rating');
  });

  it('translates a unique violation into RecipeAlreadyExistsError and rolls back', async () => {
    const violation = Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' });
    harness = mockPool(() => violation);

    const failure = await harness.storage.create(makeRecipeInput(), { id: 'taken' }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(RecipeAlreadyExistsError);
    expect(failure).toMatchObject({ recipeId: 'taken' });
    expect(statements(harness.client)).toEqual(['BEGIN', 'INSERT INTO', 'ROLLBACK']);
    expect(harness.client.release).toHaveBeenCalledTimes(1);
  });

  it('wraps other driver errors in RecipeStorageError with the cause kept', async () => {
    const driverError = Object.assign(new Error('relation "recipe_entries" does not exist'), { code: '42P01' });
    harness = mockPool(() => driverError);

    const failure = await harness.storage.list().catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(RecipeStorageError);
    expect(failure).toMatchObject({ message: 'Failed to list recipes', backend: 'sql', cause: driverError });
  });

  it('reads one recipe by id', async () => {
    harness = mockPool(() => ({ rows: [makeRow({ id: 'abc' })], rowCount: 1 }));

    const recipe = await harness.storage.get('abc');

    expect(recipe.id).toBe('abc');
    expect(harness.client.query).toHaveBeenCalledWith(expect.stringContaining('WHERE id = $1'), ['abc']);
  });

  it('fails get with RecipeNotFoundError when no row matches', async () => {
    harness = mockPool(() => ({ rows: [], rowCount: 0 }));

    await expect(harness.storage.get('missing')).rejects.toBeInstanceOf(RecipeNotFoundError);
    expect(statements(harness.client)).toEqual(['BEGIN', 'SELECT id,', 'ROLLBACK']);
  });

  it('lists rows ordered by creation time', async () => {
    harness = mockPool(() => ({ rows: [makeRow({ id: 'a' }), makeRow({ id: 'b' })], rowCount: 2 }));

    const recipes = await harness.storage.list();

    expect(recipes.map((r) => r.id)).toEqual(['a', 'b']);
    expect(harness.client.query).toHaveBeenCalledWith(expect.stringContaining('ORDER BY created_at ASC, id ASC'), undefined);
  });

  it('fails update with RecipeNotFoundError when no row matches', async () => {
    harness = mockPool(() => ({ rows: [], rowCount: 0 }));

    await expect(harness.storage.update('missing', makeRecipeInput())).rejects.toBeInstanceOf(RecipeNotFoundError);
  });

  it('replaces every column on update', async () => {
    harness = mockPool(() => ({ rows: [makeRow({ name: 'Renamed' })], rowCount: 1 }));

    const updated = await harness.storage.update('recipe-1', makeRecipeInput({ name: 'Renamed' }));

    expect(updated.name).toBe('Renamed');
    const [text, values] = harness.client.query.mock.calls[1];
    expect(text).toContain('UPDATE recipe_entries SET');
    expect(values?.[0]).toBe('recipe-1');
    expect(values?.[1]).toBe('Renamed');
  });

  it('fails delete with RecipeNotFoundError when no row is removed', async () => {
    harness = mockPool(() => ({ rows: [], rowCount: 0 }));

    await expect(harness.storage.delete('missing')).rejects.toBeInstanceOf(RecipeNotFoundError);
  });

  it('deletes a row inside a transaction', async () => {
    harness = mockPool(() => ({ rows: [], rowCount: 1 }));

    await harness.storage.delete('recipe-1');

    expect(statements(harness.client)).toEqual(['BEGIN', 'DELETE FROM', 'COMMIT']);
  });

  it('does not touch the pool when the signal is already aborted', async () => {
    harness = mockPool(() => ({ rows: [], rowCount: 0 }));
    const controller = new AbortController();
    controller.abort();

    await expect(harness.storage.list({ signal: controller.signal })).rejects.toBeInstanceOf(RecipeStorageError);
    expect(harness.pool.connect).not.toHaveBeenCalled();
  });

  it('rolls back when the signal aborts between statements', async () => {
    const controller = new AbortController();
    harness = mockPool(() => ({ rows: [], rowCount: 0 }));
    harness.client.query.mockImplementationOnce(async () => {
      controller.abort();
      return { rows: [], rowCount: 0 };
    });

    await expect(harness.storage.list({ signal: controller.signal })).rejects.toBeInstanceOf(RecipeStorageError);
    expect(statements(harness.client)).toEqual(['BEGIN', 'ROLLBACK']);
    expect(harness.client.release).toHaveBeenCalledTimes(1);
  });

  it('fails with a storage error when no connection can be acquired', async () => {
    harness = mockPool(() => ({ rows: [], rowCount: 0 }));
    harness.pool.connect.mockRejectedValueOnce(new Error('timeout exceeded when trying to connect'));

    await expect(harness.storage.get('any')).rejects.toThrow('Failed to acquire database connection');
  });

  it('ends the pool on stop', async () => {
    harness = mockPool(() => ({ rows: [], rowCount: 0 }));

    await harness.storage.stop();

    expect(harness.pool.end).toHaveBeenCalledTimes(1);
  });
});
