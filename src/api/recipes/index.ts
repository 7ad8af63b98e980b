/**
 * Recipes API exports
 */

export * from './types.ts';
export * from './schema.ts';
export * from './errors.ts';
export * from './service.ts';
export * from './routes.ts';
export * from './storage/index.ts';
