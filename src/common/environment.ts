import { z } from 'zod';
import { ConfigError } from './errors.js';

/** SQL identifier accepted as a dataset table name */
export const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATASET_PATH: z.string().default('./data/transactions.csv'),
  DATASET_TABLE: z.string().regex(TABLE_NAME_PATTERN).default('transactions'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  TRANSPORT: z.enum(['stdio']).default('stdio'),
});

export type Environment = z.infer<typeof envSchema>;

/**
 * Parse and validate process environment
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadEnvironment(source: NodeJS.ProcessEnv = process.env): Environment {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    const details = Object.entries(fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new ConfigError(`Invalid environment variables: ${details}`);
  }

  return parsed.data;
}

export interface DatasetOverrides {
  dataset?: string;
  table?: string;
}

/**
 * Environment with command-line dataset options laid over it, validated by
 * the same schema
 *
 * @throws ConfigError when an option or variable is invalid
 */
export function loadEnvironmentWith(overrides: DatasetOverrides, source: NodeJS.ProcessEnv = process.env): Environment {
  return loadEnvironment({
    ...source,
    ...(overrides.dataset !== undefined ? { DATASET_PATH: overrides.dataset } : {}),
    ...(overrides.table !== undefined ? { DATASET_TABLE: overrides.table } : {}),
  });
}

/**
 * Which accessor a dataset path needs
 */
export function datasetBackend(path: string): 'sqlite' | 'memory' {
  return /\.(db|sqlite|sqlite3)$/i.test(path) ? 'sqlite' : 'memory';
}
