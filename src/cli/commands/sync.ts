/**
 * Sync Command
 *
 * Reconciles a docs directory against the vector index and applies the plan.
 */

import type { Command } from 'commander';
import path from 'path';

import { c } from '../colors.js';
import { createServices, reportFatal } from '../helpers.js';
import {
  formatExitReasons,
  formatPlanItem,
  formatPlanSummary,
  formatRunReport,
} from '../report.js';
import { resolveConfig } from '../../core/config.js';
import { runStatus } from '../../sync/process.js';
import { syncCorpus } from '../../sync/run.js';
import { DEFAULT_DOCUMENT_GLOB } from '../../sync/discover.js';

interface SyncCommandOptions {
  docs: string;
  glob: string;
  limit?: string;
  concurrency?: string;
  table?: string;
  openaiKey?: string;
  model?: string;
  dimensions?: string;
  dryRun?: boolean;
}

/**
 * First SIGINT/SIGTERM stops dispatching new items; a second one exits now.
 */
function installCancellation(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  let received = 0;

  const onSignal = () => {
    received++;
    if (received > 1) {
      process.exit(130);
    }
    console.log(c.warning('\nStopping: waiting for in-flight documents to finish (interrupt again to force)'));
    controller.abort();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    },
  };
}

export function registerSyncCommand(program: Command): void {
  program
    .command('sync')
    .description('Embed new and changed markdown files and remove deleted ones from the index')
    .requiredOption('--docs <dir>', 'Path to docs directory')
    .option('--glob <pattern>', 'Document glob, relative to the docs directory', DEFAULT_DOCUMENT_GLOB)
    .option('--limit <n>', 'Maximum characters per document before truncation')
    .option('--concurrency <n>', 'Maximum simultaneous provider/store calls')
    .option('--table <name>', 'Vector store table')
    .option('--openai-key <key>', 'OpenAI API key (or set OPENAI_API_KEY env var)')
    .option('--model <name>', 'Embedding model')
    .option('--dimensions <n>', 'Embedding dimensions to request and expect')
    .option('--dry-run', 'Show the plan without embedding or writing anything')
    .action(async (options: SyncCommandOptions) => {
      const cancellation = installCancellation();
      try {
        await runSyncCommand(options, cancellation.signal);
      } catch (error) {
        reportFatal(error);
      } finally {
        cancellation.dispose();
      }
    });
}

async function runSyncCommand(options: SyncCommandOptions, signal: AbortSignal): Promise<void> {
  const config = await resolveConfig({
    openaiKey: options.openaiKey,
    table: options.table,
    model: options.model,
    dimensions: options.dimensions,
    limit: options.limit,
    concurrency: options.concurrency,
  });
  const { embedder, store } = createServices(config);
  const docsPath = path.resolve(options.docs);

  console.log(`\n${c.title('Vectorizer Sync')}`);
  console.log(`Docs: ${c.path(docsPath)}`);
  console.log(`Table: ${config.table}`);
  console.log(`Model: ${config.embeddingModel}`);
  console.log(`Limit: ${config.maxContentLength} chars, concurrency ${config.concurrency}\n`);

  const outcome = await syncCorpus({
    root: docsPath,
    embedder,
    store,
    glob: options.glob,
    limit: config.maxContentLength,
    concurrency: config.concurrency,
    dryRun: options.dryRun,
    signal,
    onPlan: (plan, summary, snapshot) => {
      console.log(`Plan: ${formatPlanSummary(summary)}`);
      if (!options.dryRun) return;
      for (const item of plan) {
        if (item.action === 'skip') continue;
        console.log(`  ${formatPlanItem(item, snapshot.corpus.get(item.identity)?.document.path ?? item.path)}`);
      }
    },
    onItem: (event) => {
      const mark = event.ok ? c.success('✓') : c.failure('✗');
      console.log(`  [${event.completed}/${event.total}] ${mark} ${formatPlanItem(event.item, event.path)}`);
    },
  });

  if (!outcome.result) {
    for (const failure of outcome.snapshot.unreadable) {
      console.log(c.warning(`  Unreadable: ${failure.path}: ${failure.message}`));
    }
    console.log(c.dim('\nDry run: nothing was embedded or written.'));
    return;
  }

  console.log(`\n${c.bold('Summary')}`);
  for (const line of formatRunReport(outcome.result)) {
    console.log(`  ${line}`);
  }

  const status = runStatus(outcome.result);
  const reasons = formatExitReasons(status);
  if (reasons) {
    console.log(`\n${c.failure(reasons)}`);
  } else {
    console.log(`\n${c.success('Index is in sync.')}`);
  }
  process.exitCode = status.exitCode;
}
