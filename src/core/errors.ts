/**
 * Vectorizer - Error Taxonomy
 *
 * Fatal (abort before any mutation): ConfigError, StateLoadError, CorpusReadError.
 * Per-item (recorded in the RunResult, never abort the run): ProviderError, StoreError.
 */

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
  }
}

export class StateLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StateLoadError';
  }
}

export class CorpusReadError extends Error {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`Cannot list directory ${path}: ${describeError(options?.cause)}`, options);
    this.name = 'CorpusReadError';
  }
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly transient: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }
}

export type StoreOperation = 'upsert' | 'delete' | 'listFingerprints' | 'search';

export class StoreError extends Error {
  constructor(
    public readonly operation: StoreOperation,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${operation} failed: ${message}`, options);
    this.name = 'StoreError';
  }
}

export function isFatalError(error: unknown): error is ConfigError | StateLoadError | CorpusReadError {
  return (
    error instanceof ConfigError ||
    error instanceof StateLoadError ||
    error instanceof CorpusReadError
  );
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') return message;
  }
  return String(error);
}
