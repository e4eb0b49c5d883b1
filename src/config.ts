/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import type { Knex } from 'knex';
import type { Tier } from './types/models.js';

// Get directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const rootDir = join(__dirname, '..');

// Load .env file if it exists
const envPath = join(rootDir, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // Language model
  LLM_PROVIDER: z.enum(['anthropic', 'openai']).default('anthropic'),
  LLM_MODEL_SIMPLE: z.string().optional(),
  LLM_MODEL_MODERATE: z.string().optional(),
  LLM_MODEL_COMPLEX: z.string().optional(),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  GENERATION_CONCURRENCY: z.coerce.number().int().positive().default(4),

  // API keys (provider-specific)
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),

  // Data source
  DATABASE_TYPE: z.enum(['sqlite3', 'pg', 'mysql2']).default('sqlite3'),
  DATABASE_PATH: z.string().optional(),
  DATABASE_URL: z.string().optional(),

  // Catalogs
  CATALOG_DIR: z.string().default('./.verisql/catalogs'),
  DEFAULT_CATALOG_ID: z.string().min(1).default('default'),

  // Server
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'SILENT'])
    .default('INFO'),
  MAX_QUESTION_LENGTH: z.coerce.number().int().positive().default(1000),

  // Pipeline limits
  REDUCER_MAX_TABLES: z.coerce.number().int().positive().default(5),
  ROW_CAP: z.coerce.number().int().positive().default(1000),
  EXECUTION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  EXECUTION_POOL_SIZE: z.coerce.number().int().positive().default(20),
  ATTEMPT_BUDGET: z.coerce.number().int().positive().default(3),
  SUCCESS_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),

  // Result cache
  RESULT_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  RESULT_CACHE_SIZE: z.coerce.number().int().positive().default(1000),
  REDIS_URL: z
    .string()
    .url()
    .optional()
    .describe('Connection string for the shared result cache (e.g. redis://localhost:6379)'),
});

/**
 * Type for base configuration object.
 */
type BaseConfig = z.infer<typeof ConfigSchema>;

export type LLMProvider = BaseConfig['LLM_PROVIDER'];

/**
 * Default model per provider and tier.
 */
const DEFAULT_MODELS: Record<LLMProvider, Record<Tier, string>> = {
  anthropic: {
    simple: 'claude-3-5-haiku-latest',
    moderate: 'claude-sonnet-4-5',
    complex: 'claude-sonnet-4-5',
  },
  openai: {
    simple: 'gpt-4o-mini',
    moderate: 'gpt-4o',
    complex: 'gpt-4o',
  },
};

/**
 * Extended configuration with parsed KNEX_CONFIG and LLM_CONFIG.
 */
export interface Config extends Omit<BaseConfig,
  'DATABASE_PATH' | 'DATABASE_URL' |
  'LLM_PROVIDER' | 'LLM_MODEL_SIMPLE' | 'LLM_MODEL_MODERATE' | 'LLM_MODEL_COMPLEX' |
  'LLM_MAX_TOKENS' | 'GENERATION_TIMEOUT_MS' | 'GENERATION_CONCURRENCY' |
  'ANTHROPIC_API_KEY' | 'OPENAI_API_KEY'
> {
  KNEX_CONFIG: Knex.Config;
  LLM_CONFIG: {
    provider: LLMProvider;
    models: Record<Tier, string>;
    apiKey: string;
    maxTokens: number;
    timeoutMs: number;
    concurrency: number;
  };
}

/**
 * Raised when the environment is valid per the schema but inconsistent
 * (for example a provider selected without its API key).
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

function buildKnexConfig(baseConfig: BaseConfig): Knex.Config {
  switch (baseConfig.DATABASE_TYPE) {
    case 'sqlite3':
      if (!baseConfig.DATABASE_PATH) {
        throw new ConfigError('DATABASE_PATH is required when DATABASE_TYPE is sqlite3');
      }
      return {
        client: 'better-sqlite3',
        connection: {
          filename: baseConfig.DATABASE_PATH,
        },
        useNullAsDefault: true,
      };

    case 'pg':
      if (!baseConfig.DATABASE_URL) {
        throw new ConfigError('DATABASE_URL is required when DATABASE_TYPE is pg');
      }
      return {
        client: 'pg',
        connection: baseConfig.DATABASE_URL,
        pool: { min: 2, max: baseConfig.EXECUTION_POOL_SIZE },
      };

    case 'mysql2':
      if (!baseConfig.DATABASE_URL) {
        throw new ConfigError('DATABASE_URL is required when DATABASE_TYPE is mysql2');
      }
      return {
        client: 'mysql2',
        connection: baseConfig.DATABASE_URL,
        pool: { min: 2, max: baseConfig.EXECUTION_POOL_SIZE },
      };
  }
}

function resolveApiKey(baseConfig: BaseConfig): string {
  switch (baseConfig.LLM_PROVIDER) {
    case 'anthropic':
      if (!baseConfig.ANTHROPIC_API_KEY) {
        throw new ConfigError('ANTHROPIC_API_KEY is required when LLM_PROVIDER is anthropic');
      }
      return baseConfig.ANTHROPIC_API_KEY;
    case 'openai':
      if (!baseConfig.OPENAI_API_KEY) {
        throw new ConfigError('OPENAI_API_KEY is required when LLM_PROVIDER is openai');
      }
      return baseConfig.OPENAI_API_KEY;
  }
}

/**
 * Validate an environment map and build the runtime configuration.
 *
 * @throws z.ZodError when a variable fails validation
 * @throws ConfigError when required companions are missing
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const baseConfig = ConfigSchema.parse(env);
  const defaults = DEFAULT_MODELS[baseConfig.LLM_PROVIDER];

  const {
    DATABASE_PATH,
    DATABASE_URL,
    LLM_PROVIDER,
    LLM_MODEL_SIMPLE,
    LLM_MODEL_MODERATE,
    LLM_MODEL_COMPLEX,
    LLM_MAX_TOKENS,
    GENERATION_TIMEOUT_MS,
    GENERATION_CONCURRENCY,
    ANTHROPIC_API_KEY,
    OPENAI_API_KEY,
    ...rest
  } = baseConfig;

  return {
    ...rest,
    KNEX_CONFIG: buildKnexConfig(baseConfig),
    LLM_CONFIG: {
      provider: LLM_PROVIDER,
      models: {
        simple: LLM_MODEL_SIMPLE ?? defaults.simple,
        moderate: LLM_MODEL_MODERATE ?? defaults.moderate,
        complex: LLM_MODEL_COMPLEX ?? defaults.complex,
      },
      apiKey: resolveApiKey(baseConfig),
      maxTokens: LLM_MAX_TOKENS,
      timeoutMs: GENERATION_TIMEOUT_MS,
      concurrency: GENERATION_CONCURRENCY,
    },
  };
}

/**
 * Parse and validate configuration from environment variables.
 */
function loadConfig(): Config {
  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Configuration validation failed:');
      for (const issue of error.issues) {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      }
      process.exit(1);
    }
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Global configuration instance.
 */
export const config = loadConfig();
