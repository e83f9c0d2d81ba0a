/**
 * Vectorizer - Core Types
 *
 * A local corpus of markdown documents mirrored into a remote vector index:
 * 1. Corpus Documents - ephemeral, read from disk for the current run
 * 2. Document Records - persisted rows (content + embedding + fingerprint)
 * 3. Plans and Results - per-run reconciliation state, never persisted
 */

// ============================================================================
// Keys
// ============================================================================

/** SHA-256 hex digest of a document's relative path. Primary key in the store. */
export type Identity = string;

/** SHA-256 hex digest of admitted content. Change detection only, never a key. */
export type ContentFingerprint = string;

// ============================================================================
// Local Side
// ============================================================================

export interface CorpusDocument {
  path: string;      // Relative to the corpus root, always '/'-separated
  content: string;   // Raw file text
  size: number;      // Length in code points
}

export interface LocalEntry {
  document: CorpusDocument;
  fingerprint: ContentFingerprint;   // Of the admitted (possibly truncated) content
}

export type CorpusIndex = Map<Identity, LocalEntry>;

// ============================================================================
// Remote Side
// ============================================================================

export interface RemoteEntry {
  fingerprint: ContentFingerprint;
  path: string;
}

export type RemoteState = Map<Identity, RemoteEntry>;

export interface DocumentRecord {
  identity: Identity;
  path: string;
  content: string;
  embedding: number[];
  contentFingerprint: ContentFingerprint;
}

export interface SearchMatch {
  identity: Identity;
  path: string;
  content: string;
  similarity: number;
}

// ============================================================================
// Reconciliation
// ============================================================================

export type PlanAction = 'insert' | 'update' | 'delete' | 'skip';

export interface PlanItem {
  readonly identity: Identity;
  readonly action: PlanAction;
  /** Stored path of a delete, when the listing carried one. */
  readonly path?: string;
}

export type ReconciliationPlan = ReadonlyArray<PlanItem>;

// ============================================================================
// Run Result
// ============================================================================

export type FailureKind = 'read' | 'provider' | 'store';

export interface ItemFailure {
  identity: Identity;
  path?: string;
  action?: PlanAction;   // Absent for documents that never made it into the plan
  kind: FailureKind;
  message: string;
}

/** A document that exceeded the admission limit and was embedded in truncated form. */
export interface AdmissionViolation {
  identity: Identity;
  path: string;
  size: number;
  limit: number;
}

export interface ActionCounts {
  succeeded: number;
  failed: number;
}

export interface RunResult {
  counts: Record<PlanAction, ActionCounts>;
  failures: ItemFailure[];
  truncated: AdmissionViolation[];
  cancelled: boolean;
  notAttempted: number;
}

export type RunFailureReason = 'item-failures' | 'truncated' | 'cancelled';

export interface RunStatus {
  exitCode: 0 | 1;
  reasons: RunFailureReason[];
}
