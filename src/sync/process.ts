/**
 * Vectorizer - Plan Execution
 *
 * Applies a reconciliation plan against the embedder and the vector store:
 * - insert/update: admit -> embed -> upsert
 * - delete: delete
 * - skip: nothing (no embedding is ever computed for unchanged documents)
 *
 * Items run on a bounded worker pool. A failed item is recorded and the
 * run moves on; only the RunResult collector mutates shared state.
 */

import type {
  CorpusIndex,
  DocumentRecord,
  ItemFailure,
  LocalEntry,
  PlanItem,
  ReconciliationPlan,
  RunResult,
  RunStatus,
} from '../core/types.js';
import type { Embedder } from '../core/embedder.js';
import type { VectorStore } from '../core/vector-store.js';
import { describeError } from '../core/errors.js';
import { admit, DEFAULT_MAX_CONTENT_LENGTH, type Admission } from './admission.js';
import { fingerprint } from './fingerprint.js';
import { pendingWork } from './reconcile.js';

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_CONCURRENCY = 4;

export interface ItemEvent {
  item: PlanItem;
  path?: string;
  ok: boolean;
  error?: string;
  completed: number;
  total: number;
}

export interface ExecutePlanOptions {
  embedder: Embedder;
  store: VectorStore;
  limit?: number;
  concurrency?: number;
  /** Once aborted, no further items are dispatched; in-flight ones finish. */
  signal?: AbortSignal;
  onItem?: (event: ItemEvent) => void;
}

// ============================================================================
// Run Result
// ============================================================================

export function createRunResult(): RunResult {
  return {
    counts: {
      insert: { succeeded: 0, failed: 0 },
      update: { succeeded: 0, failed: 0 },
      delete: { succeeded: 0, failed: 0 },
      skip: { succeeded: 0, failed: 0 },
    },
    failures: [],
    truncated: [],
    cancelled: false,
    notAttempted: 0,
  };
}

export function runStatus(result: RunResult): RunStatus {
  const reasons: RunStatus['reasons'] = [];
  if (result.failures.length > 0) reasons.push('item-failures');
  if (result.truncated.length > 0) reasons.push('truncated');
  if (result.cancelled) reasons.push('cancelled');
  return { exitCode: reasons.length > 0 ? 1 : 0, reasons };
}

// ============================================================================
// Execution
// ============================================================================

export async function executePlan(
  plan: ReconciliationPlan,
  corpus: CorpusIndex,
  options: ExecutePlanOptions
): Promise<RunResult> {
  const {
    embedder,
    store,
    limit = DEFAULT_MAX_CONTENT_LENGTH,
    concurrency = DEFAULT_CONCURRENCY,
    signal,
    onItem,
  } = options;

  const result = createRunResult();
  const work = pendingWork(plan);
  let completed = 0;

  const admitEntry = (identity: string, entry: LocalEntry): Admission => {
    const admission = admit(entry.document.content, limit);
    if (!admission.admitted) {
      result.truncated.push({ identity, path: entry.document.path, size: entry.document.size, limit });
    }
    return admission;
  };

  const settle = (
    item: PlanItem,
    path: string | undefined,
    failure?: Pick<ItemFailure, 'kind' | 'message'>
  ): void => {
    completed++;
    if (failure) {
      result.counts[item.action].failed++;
      result.failures.push({ identity: item.identity, path, action: item.action, ...failure });
      console.error(`[process] Failed to ${item.action} ${path ?? item.identity}: ${failure.message}`);
    } else {
      result.counts[item.action].succeeded++;
    }
    try {
      onItem?.({ item, path, ok: !failure, error: failure?.message, completed, total: work.length });
    } catch (error) {
      console.error(`[process] Progress callback failed: ${describeError(error)}`);
    }
  };

  // Skips cost nothing, but an oversized unchanged document still flags the run
  for (const item of plan) {
    if (item.action !== 'skip') continue;
    const entry = corpus.get(item.identity);
    if (entry) admitEntry(item.identity, entry);
    result.counts.skip.succeeded++;
  }

  const processItem = async (item: PlanItem): Promise<void> => {
    if (item.action === 'delete') {
      try {
        await store.delete(item.identity);
        settle(item, item.path);
      } catch (error) {
        settle(item, item.path, { kind: 'store', message: describeError(error) });
      }
      return;
    }

    const entry = corpus.get(item.identity);
    if (!entry) {
      settle(item, undefined, { kind: 'read', message: 'Document missing from corpus index' });
      return;
    }

    const { path } = entry.document;
    const admission = admitEntry(item.identity, entry);

    let embedding: number[];
    try {
      embedding = await embedder.embed(admission.content);
    } catch (error) {
      settle(item, path, { kind: 'provider', message: describeError(error) });
      return;
    }

    const record: DocumentRecord = {
      identity: item.identity,
      path,
      content: admission.content,
      embedding,
      contentFingerprint: fingerprint(admission.content),
    };

    try {
      await store.upsert(record);
      settle(item, path);
    } catch (error) {
      settle(item, path, { kind: 'store', message: describeError(error) });
    }
  };

  let cursor = 0;
  const worker = async (): Promise<void> => {
    while (cursor < work.length && !signal?.aborted) {
      const item = work[cursor++];
      await processItem(item);
    }
  };

  const workers = Math.max(1, Math.min(concurrency, work.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));

  if (signal?.aborted) {
    result.cancelled = true;
    result.notAttempted = work.length - cursor;
  }

  return result;
}
