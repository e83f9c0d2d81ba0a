/**
 * Search Command
 *
 * Nearest-neighbor lookup over the synced index.
 */

import type { Command } from 'commander';

import { c } from '../colors.js';
import { createServices, reportFatal } from '../helpers.js';
import { resolveConfig } from '../../core/config.js';
import { ConfigError } from '../../core/errors.js';

interface SearchCommandOptions {
  top: string;
  table?: string;
  openaiKey?: string;
  model?: string;
  dimensions?: string;
}

const PREVIEW_LENGTH = 160;

export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Find the documents most similar to a query')
    .argument('<query>', 'Search query')
    .option('-k, --top <n>', 'Number of results', '5')
    .option('--table <name>', 'Vector store table')
    .option('--openai-key <key>', 'OpenAI API key (or set OPENAI_API_KEY env var)')
    .option('--model <name>', 'Embedding model (must match the one used to sync)')
    .option('--dimensions <n>', 'Embedding dimensions (must match the synced index)')
    .action(async (query: string, options: SearchCommandOptions) => {
      try {
        await runSearchCommand(query, options);
      } catch (error) {
        reportFatal(error);
      }
    });
}

async function runSearchCommand(query: string, options: SearchCommandOptions): Promise<void> {
  const top = Number(options.top);
  if (!Number.isInteger(top) || top < 1) {
    throw new ConfigError(`--top must be a positive integer, got "${options.top}"`);
  }

  const config = await resolveConfig({
    openaiKey: options.openaiKey,
    table: options.table,
    model: options.model,
    dimensions: options.dimensions,
  });
  const { embedder, store } = createServices(config);

  const embedding = await embedder.embed(query);
  const matches = await store.search(embedding, top);

  if (matches.length === 0) {
    console.log(c.dim('No matches.'));
    return;
  }

  console.log(`\n${c.title(`Top ${matches.length} for "${query}"`)}\n`);
  matches.forEach((match, index) => {
    const preview = match.content.replace(/\s+/g, ' ').trim().slice(0, PREVIEW_LENGTH);
    console.log(`${index + 1}. ${c.file(match.path)} ${c.dim(match.similarity.toFixed(3))}`);
    console.log(`   ${c.dim(preview)}`);
  });
}
