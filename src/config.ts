/**
 * Service configuration.
 *
 * Loaded from an optional YAML file (path in RECIPES_CONFIG), then
 * overridden by environment variables, then validated with zod.
 * Unknown keys are rejected so typos surface at startup.
 */

import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const MemoryStorageConfigSchema = z.object({ backend: z.literal('memory') }).strict();

export const FileSystemStorageConfigSchema = z
  .object({
    backend: z.literal('fs'),
    /** Directory holding one <id>.json document per recipe */
    root: z.string().min(1, 'storage.root cannot be empty'),
  })
  .strict();

export const SqlStorageConfigSchema = z
  .object({
    backend: z.literal('sql'),
    /** postgres:// URL; PG* environment variables are used when absent */
    connectionString: z.string().min(1).optional(),
    statementTimeoutMs: z
      .number()
      .int()
      .min(100, 'statementTimeoutMs must be at least 100ms')
      .max(600000, 'statementTimeoutMs must be at most 600000ms')
      .default(5000),
    maxConnections: z.number().int().min(1).max(100).default(10),
  })
  .strict();

export const StorageConfigSchema = z.discriminatedUnion('backend', [
  MemoryStorageConfigSchema,
  FileSystemStorageConfigSchema,
  SqlStorageConfigSchema,
]);

export const ServiceConfigSchema = z
  .object({
    service: z.object({ name: z.string().min(1).default('recipe-service') }).strict().default({}),
    server: z
      .object({
        host: z.string().min(1).default('::'),
        port: z.number().int().min(0).max(65535).default(8080),
        requestTimeoutMs: z.number().int().min(100).max(600000).default(10000),
      })
      .strict()
      .default({}),
    logging: z.object({ level: LogLevelSchema.default('info') }).strict().default({}),
    storage: StorageConfigSchema.default({ backend: 'memory' }),
  })
  .strict();

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type SqlStorageConfig = z.infer<typeof SqlStorageConfigSchema>;
export type FileSystemStorageConfig = z.infer<typeof FileSystemStorageConfigSchema>;

/**
 * Invalid or unreadable configuration. Fatal at startup.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join(', ')}` : message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** YAML file to read; defaults to env.RECIPES_CONFIG */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function readYamlFile(path: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}`, [errorMessage(error)]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid YAML`, [errorMessage(error)]);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a mapping`);
  }
  return parsed;
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

function parsePort(value: string): number | string {
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : value;
}

/**
 * Applies environment overrides on top of the file contents.
 * Switching backend through RECIPES_STORAGE drops the file's backend-specific keys.
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw };

  const server = section(raw, 'server');
  if (env.PORT) server.port = parsePort(env.PORT);
  if (env.HOST) server.host = env.HOST;
  if (Object.keys(server).length > 0) result.server = server;

  const logging = section(raw, 'logging');
  if (env.LOG_LEVEL) logging.level = env.LOG_LEVEL.toLowerCase();
  if (Object.keys(logging).length > 0) result.logging = logging;

  let storage = section(raw, 'storage');
  if (env.RECIPES_STORAGE && env.RECIPES_STORAGE !== storage.backend) {
    storage = { backend: env.RECIPES_STORAGE };
  }
  if (env.RECIPES_FS_ROOT && storage.backend === 'fs') storage.root = env.RECIPES_FS_ROOT;
  if (env.DATABASE_URL && storage.backend === 'sql') storage.connectionString = env.DATABASE_URL;
  if (Object.keys(storage).length > 0) result.storage = storage;

  return result;
}

/**
 * Loads and validates the service configuration.
 * @throws ConfigError listing every validation issue
 */
export function loadConfig(options: LoadConfigOptions = {}): ServiceConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.RECIPES_CONFIG;
  const fileContents = configPath ? readYamlFile(configPath) : {};

  const result = ServiceConfigSchema.safeParse(applyEnvOverrides(fileContents, env));
  if (!result.success) {
    throw new ConfigError(
      'Invalid configuration',
      result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`),
    );
  }
  return result.data;
}
