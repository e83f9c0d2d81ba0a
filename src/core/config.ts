/**
 * Vectorizer - Centralized Config Loader
 *
 * Loads configuration from ~/.config/vectorizer/config.json with env var and
 * CLI overrides. Resolution order: CLI flag > process.env > config.json > default.
 *
 * The Supabase key (SUPABASE_SERVICE_KEY / SUPABASE_ANON_KEY) is env-only and
 * never read from or written to the config file.
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';

import { ConfigError, describeError } from './errors.js';
import { DEFAULT_EMBEDDING_MODEL } from './embedder.js';
import { DEFAULT_TABLE_NAME } from './vector-store.js';
import { DEFAULT_MAX_CONTENT_LENGTH } from '../sync/admission.js';
import { DEFAULT_CONCURRENCY } from '../sync/process.js';

// ============================================================================
// Types
// ============================================================================

export interface VectorizerConfig {
  readonly openaiApiKey: string;
  readonly supabaseUrl: string;
  readonly supabaseKey: string;
  readonly table: string;
  readonly embeddingModel: string;
  readonly embeddingDimensions?: number;
  readonly maxContentLength: number;
  readonly concurrency: number;
}

/** Values taken from command-line flags; commander hands them over as strings. */
export interface ConfigOverrides {
  openaiKey?: string;
  table?: string;
  model?: string;
  dimensions?: string | number;
  limit?: string | number;
  concurrency?: string | number;
}

export interface ResolveConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
}

// ============================================================================
// Paths
// ============================================================================

const CONFIG_DIR = path.join(os.homedir(), '.config', 'vectorizer');
const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');

export function getConfigPath(): string {
  return CONFIG_FILE;
}

// ============================================================================
// Schemas
// ============================================================================

const ConfigFileSchema = z.object({
  version: z.number().optional(),
  openai_api_key: z.string().optional(),
  supabase_url: z.string().optional(),
  table: z.string().optional(),
  embedding_model: z.string().optional(),
  embedding_dimensions: z.number().optional(),
  max_content_length: z.number().optional(),
  concurrency: z.number().optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

const ConfigSchema = z.object({
  openaiApiKey: z.string({
    required_error: 'OpenAI API key required (--openai-key, OPENAI_API_KEY, or openai_api_key in config.json)',
  }),
  supabaseUrl: z
    .string({ required_error: 'SUPABASE_URL is required (env or supabase_url in config.json)' })
    .url('SUPABASE_URL must be a URL'),
  supabaseKey: z.string({
    required_error: 'SUPABASE_SERVICE_KEY (or SUPABASE_ANON_KEY) is required',
  }),
  table: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'table must be a plain identifier'),
  embeddingModel: z.string().min(1),
  embeddingDimensions: z.coerce.number().int().positive().optional(),
  maxContentLength: z.coerce.number().int().positive('limit must be a positive integer'),
  concurrency: z.coerce
    .number()
    .int()
    .min(1, 'concurrency must be at least 1')
    .max(64, 'concurrency must be at most 64'),
});

// ============================================================================
// Config Loading
// ============================================================================

/**
 * Load config from disk. Returns null if the file doesn't exist.
 */
async function loadConfigFile(configPath: string): Promise<ConfigFile | null> {
  if (!existsSync(configPath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read ${configPath}: ${describeError(error)}`);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid config file ${configPath}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/** First value that is set and not blank. */
function pick(...values: Array<string | number | undefined>): string | number | undefined {
  for (const value of values) {
    if (typeof value === 'number') return value;
    if (value !== undefined && value.trim() !== '') return value.trim();
  }
  return undefined;
}

export async function resolveConfig(
  overrides: ConfigOverrides = {},
  options: ResolveConfigOptions = {}
): Promise<VectorizerConfig> {
  const env = options.env ?? process.env;
  const file = await loadConfigFile(options.configPath ?? CONFIG_FILE);

  const parsed = ConfigSchema.safeParse({
    openaiApiKey: pick(overrides.openaiKey, env.OPENAI_API_KEY, file?.openai_api_key),
    supabaseUrl: pick(env.SUPABASE_URL, file?.supabase_url),
    supabaseKey: pick(env.SUPABASE_SERVICE_KEY, env.SUPABASE_ANON_KEY),
    table: pick(overrides.table, env.VECTORIZER_TABLE, file?.table) ?? DEFAULT_TABLE_NAME,
    embeddingModel:
      pick(overrides.model, env.EMBEDDING_MODEL, file?.embedding_model) ?? DEFAULT_EMBEDDING_MODEL,
    embeddingDimensions: pick(
      overrides.dimensions,
      env.EMBEDDING_DIMENSIONS,
      file?.embedding_dimensions
    ),
    maxContentLength:
      pick(overrides.limit, env.VECTORIZER_MAX_CONTENT_LENGTH, file?.max_content_length) ??
      DEFAULT_MAX_CONTENT_LENGTH,
    concurrency:
      pick(overrides.concurrency, env.VECTORIZER_CONCURRENCY, file?.concurrency) ??
      DEFAULT_CONCURRENCY,
  });

  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return Object.freeze(parsed.data);
}
