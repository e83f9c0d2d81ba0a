/**
 * Vectorizer - Reconciliation
 *
 * Diffs the local corpus against the remote fingerprints. Pure: the plan
 * depends on nothing but the two maps, and every identity from either side
 * lands in exactly one bucket.
 */

import type {
  ContentFingerprint,
  Identity,
  PlanAction,
  PlanItem,
  ReconciliationPlan,
} from '../core/types.js';

export function reconcile(
  local: ReadonlyMap<Identity, { fingerprint: ContentFingerprint }>,
  remote: ReadonlyMap<Identity, { fingerprint: ContentFingerprint; path?: string }>
): ReconciliationPlan {
  const plan: PlanItem[] = [];

  for (const [identity, entry] of local) {
    const remoteFingerprint = remote.get(identity)?.fingerprint;
    let action: PlanAction;
    if (remoteFingerprint === undefined) {
      action = 'insert';
    } else if (remoteFingerprint !== entry.fingerprint) {
      action = 'update';
    } else {
      action = 'skip';
    }
    const item: PlanItem = { identity, action };
    plan.push(Object.freeze(item));
  }

  // Remote-only identities; an empty corpus turns every one of them into a delete
  for (const [identity, entry] of remote) {
    if (!local.has(identity)) {
      const item: PlanItem = { identity, action: 'delete' };
      plan.push(Object.freeze(entry.path !== undefined ? { ...item, path: entry.path } : item));
    }
  }

  return Object.freeze(plan);
}

export function summarizePlan(plan: ReconciliationPlan): Record<PlanAction, number> {
  const summary: Record<PlanAction, number> = { insert: 0, update: 0, delete: 0, skip: 0 };
  for (const item of plan) {
    summary[item.action]++;
  }
  return summary;
}

/** Items that cost a provider or store call. Skips carry no work. */
export function pendingWork(plan: ReconciliationPlan): PlanItem[] {
  return plan.filter((item) => item.action !== 'skip');
}
