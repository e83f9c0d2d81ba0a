/**
 * Plain-text rendering of plans and run results for the CLI.
 */

import type {
  PlanAction,
  PlanItem,
  RunFailureReason,
  RunResult,
  RunStatus,
} from '../core/types.js';

const ACTION_LABELS: Record<PlanAction, string> = {
  insert: 'New',
  update: 'Updated',
  delete: 'Deleted',
  skip: 'Unchanged',
};

const REASON_LABELS: Record<RunFailureReason, string> = {
  'item-failures': 'one or more documents failed',
  truncated: 'one or more files exceeded the character limit',
  cancelled: 'the run was cancelled before every item was processed',
};

export function shortIdentity(identity: string): string {
  return identity.slice(0, 12);
}

export function formatPlanItem(item: PlanItem, path?: string): string {
  return `${ACTION_LABELS[item.action]}: ${path ?? shortIdentity(item.identity)}`;
}

export function formatPlanSummary(summary: Record<PlanAction, number>): string {
  return (
    `${summary.insert} new, ${summary.update} updated, ` +
    `${summary.delete} deleted, ${summary.skip} unchanged`
  );
}

export function formatRunReport(result: RunResult): string[] {
  const { counts } = result;
  const lines = [
    `Inserted: ${counts.insert.succeeded}` + failedSuffix(counts.insert.failed),
    `Updated: ${counts.update.succeeded}` + failedSuffix(counts.update.failed),
    `Deleted: ${counts.delete.succeeded}` + failedSuffix(counts.delete.failed),
    `Unchanged: ${counts.skip.succeeded}`,
  ];

  if (result.cancelled) {
    lines.push(`Not attempted: ${result.notAttempted}`);
  }
  for (const violation of result.truncated) {
    lines.push(`Truncated: ${violation.path} (${violation.size} > ${violation.limit} chars)`);
  }
  for (const failure of result.failures) {
    const target = failure.path ?? shortIdentity(failure.identity);
    const action = failure.action ? ` ${failure.action}` : '';
    lines.push(`Failed${action} [${failure.kind}]: ${target}: ${failure.message}`);
  }

  return lines;
}

export function formatExitReasons(status: RunStatus): string | null {
  if (status.exitCode === 0) return null;
  return `Exiting with error: ${status.reasons.map((reason) => REASON_LABELS[reason]).join('; ')}`;
}

function failedSuffix(failed: number): string {
  return failed > 0 ? ` (${failed} failed)` : '';
}
