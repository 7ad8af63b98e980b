/**
 * Filesystem recipe storage: one JSON document per recipe, `<root>/<id>.json`.
 *
 * Writes go to a hidden temp file in the same directory and are flushed
 * before being published, so a reader only ever sees a complete document:
 * - create publishes with link(), which fails with EEXIST if the id is taken
 * - update publishes with rename(), which replaces the old document atomically
 *
 * Mutations on one id are serialised by a per-id lock. List order is by id.
 */

import { randomUUID } from 'node:crypto';
import { constants } from 'node:fs';
import { access, link, mkdir, open, readFile, readdir, rename, stat, unlink } from 'node:fs/promises';
import path from 'node:path';
import { createLogger, type Logger } from '../../../logger.ts';
import { RecipeAlreadyExistsError, RecipeNotFoundError, RecipeStorageError, throwIfAborted } from '../errors.ts';
import { isValidRecipeId, StoredRecipeSchema } from '../schema.ts';
import type { CreateOptions, OperationOptions, Recipe, RecipeInput } from '../types.ts';
import { KeyedMutex } from './lock.ts';
import { toRecipe, type RecipeStorage } from './types.ts';

const RECORD_EXTENSION = '.json';
const TEMP_PREFIX = '.';
const TEMP_SUFFIX = '.tmp';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export interface FileSystemRecipeStorageOptions {
  logger?: Logger;
}

export class FileSystemRecipeStorage implements RecipeStorage {
  readonly backend = 'fs' as const;

  private readonly locks = new KeyedMutex();
  private readonly logger: Logger;

  constructor(
    private readonly root: string,
    options: FileSystemRecipeStorageOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('recipes:fs');
  }

  /** Directory holding the recipe documents */
  get store(): string {
    return this.root;
  }

  async start(): Promise<void> {
    try {
      await mkdir(this.root, { recursive: true });
    } catch (error) {
      throw new RecipeStorageError(`Cannot create recipe store ${this.root}`, this.backend, { cause: error });
    }
    await this.ping();
  }

  async stop(): Promise<void> {}

  async ping(): Promise<void> {
    try {
      const info = await stat(this.root);
      if (!info.isDirectory()) {
        throw new Error(`${this.root} is not a directory`);
      }
      await access(this.root, constants.R_OK | constants.W_OK);
    } catch (error) {
      throw new RecipeStorageError(`Recipe store ${this.root} is not a writable directory`, this.backend, { cause: error });
    }
  }

  async create(input: RecipeInput, options: CreateOptions = {}): Promise<Recipe> {
    const id = options.id ?? randomUUID();
    if (!isValidRecipeId(id)) {
      throw new RecipeStorageError(`Invalid recipe id: ${id}`, this.backend);
    }

    return this.locks.runExclusive(id, async () => {
      throwIfAborted(options.signal, this.backend);
      const recipe = toRecipe(id, input);
      const tempPath = await this.writeTemp(id, recipe);
      try {
        await link(tempPath, this.filePath(id));
      } catch (error) {
        await this.removeTemp(tempPath);
        if (errorCode(error) === 'EEXIST') {
          throw new RecipeAlreadyExistsError(id);
        }
        throw new RecipeStorageError(`Failed to write recipe ${id}`, this.backend, { cause: error });
      }

      // The record is published; a leftover temp file is ignored by list.
      try {
        await this.removeTemp(tempPath);
      } catch (error) {
        this.logger.warn('Failed to remove temp file after create', { id, tempPath, error });
      }
      return recipe;
    });
  }

  async get(id: string, options: OperationOptions = {}): Promise<Recipe> {
    throwIfAborted(options.signal, this.backend);
    if (!isValidRecipeId(id)) {
      throw new RecipeNotFoundError(id);
    }
    const recipe = await this.readRecord(id);
    if (!recipe) {
      throw new RecipeNotFoundError(id);
    }
    return recipe;
  }

  async list(options: OperationOptions = {}): Promise<Recipe[]> {
    throwIfAborted(options.signal, this.backend);
    let entries: string[];
    try {
      entries = await readdir(this.root);
    } catch (error) {
      throw new RecipeStorageError(`Failed to list recipe store ${this.root}`, this.backend, { cause: error });
    }

    const ids = entries
      .filter((name) => name.endsWith(RECORD_EXTENSION) && !name.startsWith(TEMP_PREFIX))
      .map((name) => name.slice(0, -RECORD_EXTENSION.length))
      .filter(isValidRecipeId)
      .sort();

    const recipes: Recipe[] = [];
    for (const id of ids) {
      throwIfAborted(options.signal, this.backend);
      // Deleted between readdir and read: not part of the listing.
      const recipe = await this.readRecord(id);
      if (recipe) {
        recipes.push(recipe);
      }
    }
    return recipes;
  }

  async update(id: string, input: RecipeInput, options: OperationOptions = {}): Promise<Recipe> {
    if (!isValidRecipeId(id)) {
      throw new RecipeNotFoundError(id);
    }

    return this.locks.runExclusive(id, async () => {
      throwIfAborted(options.signal, this.backend);
      if (!(await this.exists(id))) {
        throw new RecipeNotFoundError(id);
      }
      const recipe = toRecipe(id, input);
      const tempPath = await this.writeTemp(id, recipe);
      try {
        await rename(tempPath, this.filePath(id));
      } catch (error) {
        await this.removeTemp(tempPath);
        throw new RecipeStorageError(`Failed to write recipe ${id}`, this.backend, { cause: error });
      }
      return recipe;
    });
  }

  async delete(id: string, options: OperationOptions = {}): Promise<void> {
    if (!isValidRecipeId(id)) {
      throw new RecipeNotFoundError(id);
    }

    await this.locks.runExclusive(id, async () => {
      throwIfAborted(options.signal, this.backend);
      try {
        await unlink(this.filePath(id));
      } catch (error) {
        if (errorCode(error) === 'ENOENT') {
          throw new RecipeNotFoundError(id);
        }
        throw new RecipeStorageError(`Failed to delete recipe ${id}`, this.backend, { cause: error });
      }
    });
  }

  async clear(options: OperationOptions = {}): Promise<void> {
    const recipes = await this.list(options);
    for (const recipe of recipes) {
      try {
        await this.delete(recipe.id, options);
      } catch (error) {
        if (!(error instanceof RecipeNotFoundError)) {
          throw error;
        }
      }
    }
  }

  private filePath(id: string): string {
    return path.join(this.root, `${id}${RECORD_EXTENSION}`);
  }

  private async exists(id: string): Promise<boolean> {
    try {
      await stat(this.filePath(id));
      return true;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return false;
      }
      throw new RecipeStorageError(`Failed to stat recipe ${id}`, this.backend, { cause: error });
    }
  }

  /**
   * Reads and validates one document. Returns null when the file does not exist.
   */
  private async readRecord(id: string): Promise<Recipe | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath(id), 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw new RecipeStorageError(`Failed to read recipe ${id}`, this.backend, { cause: error });
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new RecipeStorageError(`Recipe document ${id} is not valid JSON`, this.backend, { cause: error });
    }

    const parsed = StoredRecipeSchema.safeParse(document);
    if (!parsed.success || parsed.data.id !== id) {
      throw new RecipeStorageError(`Recipe document ${id} is corrupt`, this.backend, {
        cause: parsed.success ? new Error(`document id ${parsed.data.id} does not match file name`) : parsed.error,
      });
    }
    return toRecipe(id, parsed.data);
  }

  /**
   * Writes the document to a fresh temp file and flushes it to disk.
   */
  private async writeTemp(id: string, recipe: Recipe): Promise<string> {
    const tempPath = path.join(this.root, `${TEMP_PREFIX}${id}.${randomUUID()}${TEMP_SUFFIX}`);
    try {
      const handle = await open(tempPath, 'wx');
      try {
        await handle.writeFile(JSON.stringify(recipe, null, 2), 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (error) {
      await this.removeTemp(tempPath);
      throw new RecipeStorageError(`Failed to write recipe ${id}`, this.backend, { cause: error });
    }
    return tempPath;
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await unlink(tempPath);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw new RecipeStorageError(`Failed to remove temp file ${tempPath}`, this.backend, { cause: error });
      }
    }
  }
}
