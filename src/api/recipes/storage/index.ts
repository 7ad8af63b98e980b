export * from './types.ts';
export * from './lock.ts';
export * from './memory.ts';
export * from './filesystem.ts';
export * from './sql.ts';
export * from './factory.ts';
