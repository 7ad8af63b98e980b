import type { StorageConfig } from '../../../config.ts';
import { createPool } from '../../../db.ts';
import type { Logger } from '../../../logger.ts';
import { FileSystemRecipeStorage } from './filesystem.ts';
import { MemoryRecipeStorage } from './memory.ts';
import { SqlRecipeStorage } from './sql.ts';
import type { RecipeStorage } from './types.ts';

/**
 * Selects the storage backend named in the configuration.
 * The backend is fixed for the lifetime of the process.
 */
export function createRecipeStorage(config: StorageConfig, logger?: Logger): RecipeStorage {
  switch (config.backend) {
    case 'memory':
      return new MemoryRecipeStorage();
    case 'fs':
      return new FileSystemRecipeStorage(config.root, { logger });
    case 'sql':
      return new SqlRecipeStorage(createPool(config), { logger, ownsPool: true });
  }
}
