/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';

// Get directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const rootDir = join(__dirname, '..');

// Load .env file if it exists
const envPath = join(rootDir, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // Target database
  DB_TYPE: z.enum(['mysql', 'postgres', 'sqlite']).default('mysql'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z
    .string()
    .regex(/^\d*$/, 'DB_PORT must be numeric')
    .optional()
    .transform((value) => (value ? Number(value) : undefined)),
  DB_NAME: z.string().default(''),
  DB_USER: z.string().default(''),
  DB_PASSWORD: z.string().default(''),

  // LLM provider used to generate the use-case catalog
  LLM_PROVIDER: z.enum(['anthropic', 'openai', 'google']).default('google'),
  LLM_MODEL: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  GOOGLE_API_KEY: z.string().optional(),

  // Server
  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'SILENT'])
    .default('INFO'),
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().default('0.0.0.0'),

  // Execution and catalog behaviour
  CLEAR_DEPENDENTS: booleanFlag.default('true'),
  MAX_PER_CATEGORY: z.coerce.number().int().positive().default(5),
  CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

type BaseConfig = z.infer<typeof ConfigSchema>;

export type BackendKind = BaseConfig['DB_TYPE'];
export type LLMProvider = BaseConfig['LLM_PROVIDER'];

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  anthropic: 'claude-sonnet-4-5-20250929',
  openai: 'gpt-4o',
  google: 'gemini-1.5-pro',
};

/**
 * Extended configuration with the connection profile and LLM settings grouped.
 */
export interface Config
  extends Omit<
    BaseConfig,
    | 'DB_TYPE'
    | 'DB_HOST'
    | 'DB_PORT'
    | 'DB_NAME'
    | 'DB_USER'
    | 'DB_PASSWORD'
    | 'LLM_PROVIDER'
    | 'LLM_MODEL'
    | 'ANTHROPIC_API_KEY'
    | 'OPENAI_API_KEY'
    | 'GOOGLE_API_KEY'
  > {
  DATABASE: {
    backendKind: BackendKind;
    host: string;
    port?: number;
    database: string;
    user: string;
    password: string;
  };
  LLM_CONFIG: {
    provider: LLMProvider;
    model: string;
    /** Missing keys are reported when the catalog is first generated. */
    apiKey?: string;
    maxTokens: number;
  };
}

function apiKeyFor(base: BaseConfig): string | undefined {
  switch (base.LLM_PROVIDER) {
    case 'anthropic':
      return base.ANTHROPIC_API_KEY;
    case 'openai':
      return base.OPENAI_API_KEY;
    case 'google':
      return base.GOOGLE_API_KEY;
  }
}

/**
 * Parse and validate configuration from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  let baseConfig: BaseConfig;

  try {
    baseConfig = ConfigSchema.parse(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Configuration validation failed:');
      for (const issue of error.issues) {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      }
      process.exit(1);
    }
    throw error;
  }

  const {
    DB_TYPE,
    DB_HOST,
    DB_PORT,
    DB_NAME,
    DB_USER,
    DB_PASSWORD,
    LLM_PROVIDER,
    LLM_MODEL,
    ANTHROPIC_API_KEY,
    OPENAI_API_KEY,
    GOOGLE_API_KEY,
    ...rest
  } = baseConfig;

  return {
    ...rest,
    DATABASE: {
      backendKind: DB_TYPE,
      host: DB_HOST,
      port: DB_PORT,
      database: DB_NAME,
      user: DB_USER,
      password: DB_PASSWORD,
    },
    LLM_CONFIG: {
      provider: LLM_PROVIDER,
      model: LLM_MODEL ?? DEFAULT_MODELS[LLM_PROVIDER],
      apiKey: apiKeyFor(baseConfig),
      maxTokens: 4096,
    },
  };
}

/**
 * Global configuration instance.
 */
export const config = loadConfig();
