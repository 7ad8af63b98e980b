/**
 * Behaviour every RecipeStorage backend must share.
 * Each backend test file calls describeRecipeStorageContract with its own factory.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { RecipeAlreadyExistsError, RecipeNotFoundError, RecipeStorageError } from '../../src/api/recipes/errors.ts';
import type { RecipeStorage } from '../../src/api/recipes/storage/types.ts';
import { makeOtherRecipeInput, makeRecipeInput } from './recipes.ts';

export interface StorageHarness {
  storage: RecipeStorage;
  cleanup?: () => Promise<void>;
}

export function describeRecipeStorageContract(name: string, factory: () => Promise<StorageHarness>): void {
  describe(`${name} storage contract`, () => {
    let harness: StorageHarness;
    let storage: RecipeStorage;

    beforeEach(async () => {
      harness = await factory();
      storage = harness.storage;
      await storage.start();
    });

    afterEach(async () => {
      await storage.stop();
      await harness.cleanup?.();
    });

    it('creates a recipe under the requested id and reads it back', async () => {
      const input = makeRecipeInput();
      const created = await storage.create(input, { id: 'recipe-1' });

      expect(created).toEqual({ id: 'recipe-1', ...input });
      expect(await storage.get('recipe-1')).toEqual({ id: 'recipe-1', ...input });
    });

    it('assigns an id when none is given', async () => {
      const created = await storage.create(makeRecipeInput());

      expect(created.id).toMatch(/^[0-9a-f-]{36}$/);
      expect((await storage.get(created.id)).name).toBe('Lemon Rice');
    });

    it('rejects a create that collides with an existing id', async () => {
      await storage.create(makeRecipeInput(), { id: 'dup' });

      await expect(storage.create(makeOtherRecipeInput(), { id: 'dup' })).rejects.toBeInstanceOf(RecipeAlreadyExistsError);
      expect((await storage.get('dup')).name).toBe('Lemon Rice');
    });

    it('fails get for an unknown id', async () => {
      await expect(storage.get('missing')).rejects.toBeInstanceOf(RecipeNotFoundError);
    });

    it('lists every recipe, each retrievable on its own', async () => {
      const ids = ['a-1', 'b-2', 'c-3', 'd-4'];
      for (const id of ids) {
        await storage.create(makeRecipeInput({ name: `Recipe ${id}` }), { id });
      }

      const listed = await storage.list();
      expect(listed).toHaveLength(4);
      expect(listed.map((r) => r.id).sort()).toEqual(ids);
      for (const recipe of listed) {
        expect(await storage.get(recipe.id)).toEqual(recipe);
      }
    });

    it('returns an empty list for an empty store', async () => {
      expect(await storage.list()).toEqual([]);
    });

    it('replaces every field on update, dropping omitted optional fields', async () => {
      await storage.create(makeRecipeInput(), { id: 'r-1' });
      const replacement = makeOtherRecipeInput();

      const updated = await storage.update('r-1', replacement);

      expect(updated).toEqual({ id: 'r-1', ...replacement });
      const stored = await storage.get('r-1');
      expect(stored).toEqual({ id: 'r-1', ...replacement });
      expect(stored).not.toHaveProperty('rating');
    });

    it('fails update for an unknown id without creating it', async () => {
      await expect(storage.update('ghost', makeRecipeInput())).rejects.toBeInstanceOf(RecipeNotFoundError);
      await expect(storage.get('ghost')).rejects.toBeInstanceOf(RecipeNotFoundError);
    });

    it('deletes a recipe so later reads fail', async () => {
      await storage.create(makeRecipeInput(), { id: 'gone' });

      await storage.delete('gone');

      await expect(storage.get('gone')).rejects.toBeInstanceOf(RecipeNotFoundError);
      expect(await storage.list()).toEqual([]);
    });

    it('fails delete for an unknown id', async () => {
      await expect(storage.delete('never-there')).rejects.toBeInstanceOf(RecipeNotFoundError);
    });

    it('reports an overlong unknown id as not found', async () => {
      const longId = 'a'.repeat(251);

      await expect(storage.get(longId)).rejects.toBeInstanceOf(RecipeNotFoundError);
      await expect(storage.update(longId, makeRecipeInput())).rejects.toBeInstanceOf(RecipeNotFoundError);
      await expect(storage.delete(longId)).rejects.toBeInstanceOf(RecipeNotFoundError);
    });

    it('stores a recipe under an id of the maximum length', async () => {
      const maxId = 'b'.repeat(200);

      await storage.create(makeRecipeInput(), { id: maxId });
      await storage.update(maxId, makeOtherRecipeInput());

      expect((await storage.get(maxId)).name).toBe('Tomato Soup');
      await storage.delete(maxId);
    });

    it('returns copies that do not alias the stored record', async () => {
      const created = await storage.create(makeRecipeInput(), { id: 'copy' });
      created.ingredients.push('mutated');
      created.nutrition.calories = 0;

      const stored = await storage.get('copy');
      expect(stored.ingredients).toEqual(['1 cup basmati rice', '1 lemon', '8 curry leaves']);
      expect(stored.nutrition.calories).toBe(320);
    });

    it('clears every recipe', async () => {
      await storage.create(makeRecipeInput(), { id: 'x-1' });
      await storage.create(makeRecipeInput(), { id: 'x-2' });

      await storage.clear();

      expect(await storage.list()).toEqual([]);
    });

    it('refuses work once the signal is aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(storage.create(makeRecipeInput(), { id: 'late', signal: controller.signal })).rejects.toBeInstanceOf(
        RecipeStorageError,
      );
      await expect(storage.get('late')).rejects.toBeInstanceOf(RecipeNotFoundError);
    });

    it('answers ping once started', async () => {
      await expect(storage.ping()).resolves.toBeUndefined();
    });
  });
}
