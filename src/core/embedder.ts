/**
 * Vectorizer - Embedding Generation
 *
 * Wraps OpenAI's embeddings API behind a narrow `Embedder` capability.
 * Transient failures are retried with bounded backoff; everything else
 * surfaces immediately as a ProviderError for the one item that hit it.
 */

import OpenAI from 'openai';

import { ProviderError, describeError } from './errors.js';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy, type Sleep } from './retry.js';

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-large';
export const DEFAULT_EMBEDDING_TIMEOUT_MS = 60000;

export interface Embedder {
  readonly model: string;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

/**
 * The slice of the OpenAI client this adapter uses. `OpenAI` satisfies it;
 * tests hand in a scripted stand-in.
 */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string; dimensions?: number },
      options?: { signal?: AbortSignal }
    ): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

export interface OpenAIEmbedderOptions {
  apiKey: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
  retry?: RetryPolicy;
  sleep?: Sleep;
}

// ============================================================================
// Error Classification
// ============================================================================

const RETRYABLE_STATUS = new Set([408, 409, 429]);

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number') return status;
  }
  return undefined;
}

/**
 * Timeouts, dropped connections, rate limits and server-side errors are
 * worth another attempt. Auth and request errors are not.
 */
export function isTransientProviderError(error: unknown): boolean {
  if (error instanceof ProviderError) return error.transient;
  if (error instanceof OpenAI.APIConnectionError) return true;

  const status = statusOf(error);
  if (status !== undefined) {
    return RETRYABLE_STATUS.has(status) || status >= 500;
  }

  const message = describeError(error);
  return (
    message.includes('Connection') ||
    message.includes('timeout') ||
    message.includes('ECONNRESET') ||
    message.includes('rate limit')
  );
}

// ============================================================================
// OpenAI Embedder
// ============================================================================

export class OpenAIEmbedder implements Embedder {
  public readonly model: string;
  private readonly dimensions?: number;
  private readonly retry: RetryPolicy;
  private readonly sleep?: Sleep;
  private readonly client: EmbeddingsClient;

  public constructor(options: OpenAIEmbedderOptions, client?: EmbeddingsClient) {
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.dimensions = options.dimensions;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep;
    // Retries are owned here, so the SDK's own are switched off
    this.client =
      client ??
      new OpenAI({
        apiKey: options.apiKey,
        maxRetries: 0,
        timeout: options.timeoutMs ?? DEFAULT_EMBEDDING_TIMEOUT_MS,
      });
  }

  public async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    try {
      return await withRetry(() => this.request(text, signal), {
        policy: this.retry,
        isRetryable: isTransientProviderError,
        sleep: this.sleep,
        onRetry: (error, attempt, delayMs) => {
          console.error(
            `[embedder] Attempt ${attempt}/${this.retry.attempts} failed (${describeError(error)}), retrying in ${delayMs}ms`
          );
        },
      });
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(describeError(error), isTransientProviderError(error), { cause: error });
    }
  }

  private async request(text: string, signal?: AbortSignal): Promise<number[]> {
    const response = await this.client.embeddings.create(
      {
        model: this.model,
        input: text,
        ...(this.dimensions !== undefined ? { dimensions: this.dimensions } : {}),
      },
      signal ? { signal } : undefined
    );

    const embedding = response.data[0]?.embedding;
    if (!Array.isArray(embedding) || embedding.length === 0) {
      throw new ProviderError('Malformed response: no embedding returned', false);
    }
    if (this.dimensions !== undefined && embedding.length !== this.dimensions) {
      throw new ProviderError(
        `Malformed response: expected ${this.dimensions} dimensions, got ${embedding.length}`,
        false
      );
    }
    return embedding;
  }
}
