/**
 * Vectorizer - Sync Run
 *
 * One snapshot -> diff -> apply cycle:
 * 1. Load remote fingerprints (fail fast, nothing mutated yet)
 * 2. Read and fingerprint the local corpus
 * 3. Reconcile into a plan
 * 4. Execute the plan (skipped on dry runs)
 *
 * No item starts before the whole plan exists, and nothing carries over
 * between runs.
 */

import type {
  CorpusIndex,
  ItemFailure,
  PlanAction,
  ReconciliationPlan,
  RemoteState,
  RunResult,
} from '../core/types.js';
import type { Embedder } from '../core/embedder.js';
import type { VectorStore } from '../core/vector-store.js';
import { StateLoadError, describeError } from '../core/errors.js';
import { admit, DEFAULT_MAX_CONTENT_LENGTH } from './admission.js';
import { readCorpus, type ReadCorpusOptions } from './discover.js';
import { fingerprint, identityOf } from './fingerprint.js';
import { executePlan, type ItemEvent } from './process.js';
import { reconcile, summarizePlan } from './reconcile.js';

// ============================================================================
// Types
// ============================================================================

export interface CorpusSnapshot {
  corpus: CorpusIndex;
  /** Files that matched but could not be read; kept out of the plan entirely. */
  unreadable: ItemFailure[];
}

export interface SyncOptions {
  root: string;
  embedder: Embedder;
  store: VectorStore;
  glob?: string;
  limit?: number;
  concurrency?: number;
  dryRun?: boolean;
  signal?: AbortSignal;
  onPlan?: (
    plan: ReconciliationPlan,
    summary: Record<PlanAction, number>,
    snapshot: CorpusSnapshot
  ) => void;
  onItem?: (event: ItemEvent) => void;
}

export interface SyncOutcome {
  plan: ReconciliationPlan;
  snapshot: CorpusSnapshot;
  /** Absent on dry runs. */
  result?: RunResult;
}

// ============================================================================
// Snapshot
// ============================================================================

export async function loadRemoteState(store: VectorStore): Promise<RemoteState> {
  try {
    return await store.listFingerprints();
  } catch (error) {
    throw new StateLoadError(`Could not load remote fingerprints: ${describeError(error)}`, {
      cause: error,
    });
  }
}

export async function snapshotCorpus(
  root: string,
  options: ReadCorpusOptions & { limit?: number } = {}
): Promise<CorpusSnapshot> {
  const { limit = DEFAULT_MAX_CONTENT_LENGTH, ...readOptions } = options;
  const corpus: CorpusIndex = new Map();
  const unreadable: ItemFailure[] = [];

  for await (const entry of readCorpus(root, readOptions)) {
    if (entry.kind === 'unreadable') {
      unreadable.push({
        identity: identityOf(entry.path),
        path: entry.path,
        kind: 'read',
        message: entry.error,
      });
      continue;
    }

    const { document } = entry;
    corpus.set(identityOf(document.path), {
      document,
      fingerprint: fingerprint(admit(document.content, limit).content),
    });
  }

  return { corpus, unreadable };
}

// ============================================================================
// Run
// ============================================================================

export async function syncCorpus(options: SyncOptions): Promise<SyncOutcome> {
  const {
    root,
    embedder,
    store,
    glob,
    limit = DEFAULT_MAX_CONTENT_LENGTH,
    concurrency,
    dryRun = false,
    signal,
    onPlan,
    onItem,
  } = options;

  const remote = new Map(await loadRemoteState(store));
  const snapshot = await snapshotCorpus(root, { glob, limit });

  // An unreadable file still exists; its record must not be planned as a delete
  for (const failure of snapshot.unreadable) {
    remote.delete(failure.identity);
  }

  const plan = reconcile(snapshot.corpus, remote);
  onPlan?.(plan, summarizePlan(plan), snapshot);

  if (dryRun) {
    return { plan, snapshot };
  }

  const result = await executePlan(plan, snapshot.corpus, {
    embedder,
    store,
    limit,
    concurrency,
    signal,
    onItem,
  });
  result.failures.unshift(...snapshot.unreadable);

  return { plan, snapshot, result };
}
