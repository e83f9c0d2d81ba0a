/**
 * CLI Helper Functions
 *
 * Shared utilities for CLI commands.
 */

import type { VectorizerConfig } from '../core/config.js';
import { OpenAIEmbedder, type Embedder } from '../core/embedder.js';
import { ProviderError, StoreError, isFatalError, describeError } from '../core/errors.js';
import { createSupabaseClient } from '../core/vector-store-client.js';
import { SupabaseVectorStore, type VectorStore } from '../core/vector-store.js';
import { c } from './colors.js';

export interface Services {
  embedder: Embedder;
  store: VectorStore;
}

/**
 * Build the embedder and store from a resolved configuration.
 */
export function createServices(config: VectorizerConfig): Services {
  const embedder = new OpenAIEmbedder({
    apiKey: config.openaiApiKey,
    model: config.embeddingModel,
    dimensions: config.embeddingDimensions,
  });

  const client = createSupabaseClient({ url: config.supabaseUrl, key: config.supabaseKey });
  const store = new SupabaseVectorStore(client, { table: config.table });

  return { embedder, store };
}

/**
 * Print an error that stopped a command and flag the process as failed.
 * Errors outside the project's own taxonomy are rethrown.
 */
export function reportFatal(error: unknown): void {
  if (!isFatalError(error) && !(error instanceof ProviderError) && !(error instanceof StoreError)) {
    throw error;
  }
  console.error(`\n${c.error(error.name)} ${describeError(error)}`);
  process.exitCode = 1;
}
