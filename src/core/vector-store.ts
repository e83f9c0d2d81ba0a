/**
 * Vectorizer - Vector Store (Supabase + pgvector)
 *
 * Record-oriented store keyed by Identity. One logical operation per call;
 * the table and the `match_documents` function come from supabase/migrations.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type { DocumentRecord, Identity, RemoteState, SearchMatch } from './types.js';
import { StoreError, describeError, type StoreOperation } from './errors.js';
import { withRetry, type RetryPolicy, type Sleep } from './retry.js';

export const DEFAULT_TABLE_NAME = 'documents';

export interface VectorStore {
  upsert(record: DocumentRecord): Promise<void>;
  /** Deleting an identity that is not stored is not an error. */
  delete(identity: Identity): Promise<void>;
  /** The full (identity, fingerprint) listing. Never partial: fails or returns everything. */
  listFingerprints(): Promise<RemoteState>;
  search(embedding: number[], limit: number): Promise<SearchMatch[]>;
}

// ============================================================================
// Row Schemas
// ============================================================================

const FingerprintRowSchema = z.object({
  id: z.string(),
  path: z.string(),
  content_hash: z.string(),
});

const MatchRowSchema = z.object({
  id: z.string(),
  path: z.string(),
  content: z.string(),
  similarity: z.number(),
});

// ============================================================================
// Query Plumbing
// ============================================================================

interface QueryResponse {
  data: unknown;
  error: { message: string; code?: string } | null;
  status: number;
}

/** A PostgREST error response, kept apart from thrown transport failures. */
class ResponseError extends Error {
  constructor(message: string, public readonly status: number) {
    super(message);
    this.name = 'ResponseError';
  }
}

// status 0 is how postgrest-js reports a fetch that never got a response
function isTransientStoreFailure(error: unknown): boolean {
  if (error instanceof ResponseError) {
    return error.status === 0 || error.status >= 500;
  }
  return true;
}

const STORE_RETRY_POLICY: RetryPolicy = {
  attempts: 2,
  baseDelayMs: 500,
  maxDelayMs: 500,
};

// ============================================================================
// Supabase Store
// ============================================================================

export interface SupabaseVectorStoreOptions {
  table?: string;
  pageSize?: number;
  retry?: RetryPolicy;
  sleep?: Sleep;
}

export class SupabaseVectorStore implements VectorStore {
  private readonly table: string;
  private readonly pageSize: number;
  private readonly retry: RetryPolicy;
  private readonly sleep?: Sleep;

  public constructor(
    private readonly client: SupabaseClient,
    options: SupabaseVectorStoreOptions = {}
  ) {
    this.table = options.table ?? DEFAULT_TABLE_NAME;
    this.pageSize = options.pageSize ?? 1000;
    this.retry = options.retry ?? STORE_RETRY_POLICY;
    this.sleep = options.sleep;
  }

  public async upsert(record: DocumentRecord): Promise<void> {
    await this.run('upsert', () =>
      this.client.from(this.table).upsert(
        {
          id: record.identity,
          path: record.path,
          content: record.content,
          embedding: record.embedding,
          content_hash: record.contentFingerprint,
          indexed_at: new Date().toISOString(),
        },
        { onConflict: 'id' }
      )
    );
  }

  public async delete(identity: Identity): Promise<void> {
    await this.run('delete', () => this.client.from(this.table).delete().eq('id', identity));
  }

  public async listFingerprints(): Promise<RemoteState> {
    const state: RemoteState = new Map();
    let from = 0;

    // The server may return fewer rows than asked for (PostgREST max-rows),
    // so only an empty page ends the listing
    for (;;) {
      const data = await this.run('listFingerprints', () =>
        this.client
          .from(this.table)
          .select('id, path, content_hash')
          .order('id', { ascending: true })
          .range(from, from + this.pageSize - 1)
      );

      const parsed = z.array(FingerprintRowSchema).safeParse(data ?? []);
      if (!parsed.success) {
        throw new StoreError('listFingerprints', `Unexpected row shape: ${parsed.error.message}`);
      }

      if (parsed.data.length === 0) break;
      for (const row of parsed.data) {
        state.set(row.id, { fingerprint: row.content_hash, path: row.path });
      }
      from += parsed.data.length;
    }

    return state;
  }

  public async search(embedding: number[], limit: number): Promise<SearchMatch[]> {
    const data = await this.run('search', () =>
      this.client.rpc('match_documents', {
        query_embedding: embedding,
        match_count: limit,
      })
    );

    const parsed = z.array(MatchRowSchema).safeParse(data ?? []);
    if (!parsed.success) {
      throw new StoreError('search', `Unexpected row shape: ${parsed.error.message}`);
    }

    return parsed.data
      .map((row) => ({
        identity: row.id,
        path: row.path,
        content: row.content,
        similarity: row.similarity,
      }))
      .sort((a, b) => b.similarity - a.similarity);
  }

  /**
   * Execute one query, retrying transport-level failures. Every operation
   * here is idempotent, so repeating one is safe.
   */
  private async run(
    operation: StoreOperation,
    query: () => PromiseLike<QueryResponse>
  ): Promise<unknown> {
    try {
      return await withRetry(
        async () => {
          const { data, error, status } = await query();
          if (error) {
            throw new ResponseError(error.message, status);
          }
          return data;
        },
        {
          policy: this.retry,
          isRetryable: isTransientStoreFailure,
          sleep: this.sleep,
          onRetry: (error) => {
            console.error(`[vector-store] ${operation} failed (${describeError(error)}), retrying`);
          },
        }
      );
    } catch (error) {
      throw new StoreError(operation, describeError(error), { cause: error });
    }
  }
}
