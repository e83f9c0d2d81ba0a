import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';

import { resolveConfig } from '../../src/core/config.js';
import { ConfigError } from '../../src/core/errors.js';

const baseEnv = {
  OPENAI_API_KEY: 'test-secret',
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_SERVICE_KEY: 'test-service-key',
};

describe('resolveConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'vectorizer-config-'));
    configPath = path.join(dir, 'config.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('fills defaults around the required credentials', async () => {
    const config = await resolveConfig({}, { env: baseEnv, configPath });

    expect(config).toEqual({
      openaiApiKey: 'test-secret',
      supabaseUrl: 'http://localhost:54321',
      supabaseKey: 'test-service-key',
      table: 'documents',
      embeddingModel: 'text-embedding-3-large',
      maxContentLength: 10000,
      concurrency: 4,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('prefers flags over env over the config file', async () => {
    await writeFile(
      configPath,
      JSON.stringify({ table: 'from_file', max_content_length: 500, concurrency: 2, embedding_model: 'file-model' })
    );

    const config = await resolveConfig(
      { limit: '250' },
      { env: { ...baseEnv, VECTORIZER_TABLE: 'from_env', VECTORIZER_MAX_CONTENT_LENGTH: '400' }, configPath }
    );

    expect(config.maxContentLength).toBe(250);
    expect(config.table).toBe('from_env');
    expect(config.concurrency).toBe(2);
    expect(config.embeddingModel).toBe('file-model');
  });

  it('reads the OpenAI key from the config file but never the Supabase key', async () => {
    await writeFile(
      configPath,
      JSON.stringify({ openai_api_key: 'file-secret', supabase_url: 'http://localhost:54321' })
    );

    const config = await resolveConfig(
      {},
      { env: { SUPABASE_ANON_KEY: 'test-anon-key' }, configPath }
    );
    expect(config.openaiApiKey).toBe('file-secret');
    expect(config.supabaseKey).toBe('test-anon-key');
  });

  it('ignores blank values and falls through to the next source', async () => {
    const config = await resolveConfig({ table: '  ' }, { env: { ...baseEnv, VECTORIZER_TABLE: '' }, configPath });
    expect(config.table).toBe('documents');
  });

  it('reports every missing credential at once', async () => {
    const error = await resolveConfig({}, { env: {}, configPath }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(error.issues).toEqual([
      'openaiApiKey: OpenAI API key required (--openai-key, OPENAI_API_KEY, or openai_api_key in config.json)',
      'supabaseUrl: SUPABASE_URL is required (env or supabase_url in config.json)',
      'supabaseKey: SUPABASE_SERVICE_KEY (or SUPABASE_ANON_KEY) is required',
    ]);
  });

  it('rejects out-of-range concurrency and a non-positive limit', async () => {
    const error = await resolveConfig(
      { concurrency: '0', limit: '-1' },
      { env: baseEnv, configPath }
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(error.issues).toEqual([
      'maxContentLength: limit must be a positive integer',
      'concurrency: concurrency must be at least 1',
    ]);
  });

  it('rejects a table name that is not a plain identifier', async () => {
    await expect(
      resolveConfig({ table: 'docs; drop table x' }, { env: baseEnv, configPath })
    ).rejects.toThrow('table: table must be a plain identifier');
  });

  it('rejects a config file that is not valid JSON', async () => {
    await writeFile(configPath, '{ not json');
    await expect(resolveConfig({}, { env: baseEnv, configPath })).rejects.toThrow(
      `Cannot read ${configPath}`
    );
  });

  it('rejects a config file with the wrong shape', async () => {
    await writeFile(configPath, JSON.stringify({ concurrency: 'many' }));

    const error = await resolveConfig({}, { env: baseEnv, configPath }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(error.message.startsWith(`Invalid config file ${configPath}`)).toBe(true);
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].startsWith('concurrency: ')).toBe(true);
  });
});
