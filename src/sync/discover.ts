/**
 * Vectorizer - Corpus Discovery
 *
 * Walks the corpus root and yields markdown documents lazily. Re-running
 * against the same tree yields the same set; the order is not meaningful.
 */

import { readFile, readdir, stat } from 'fs/promises';
import path from 'path';

import type { CorpusDocument } from '../core/types.js';
import { ConfigError, CorpusReadError, describeError } from '../core/errors.js';
import { contentLength } from './admission.js';
import { normalizeRelativePath } from './fingerprint.js';

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_DOCUMENT_GLOB = '**/*.md';

// Invalid UTF-8 is an unreadable file, not text with replacement characters
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export type CorpusEntry =
  | { kind: 'document'; document: CorpusDocument }
  | { kind: 'unreadable'; path: string; error: string };

export interface ReadCorpusOptions {
  glob?: string;
}

// ============================================================================
// Glob Matching
// ============================================================================

/**
 * Simple glob pattern matching for common patterns:
 * - "**\/*.md" - any .md file in any subdirectory
 * - "*.md" - .md files in root only
 * - "**\/*.{md,markdown}" - multiple extensions
 */
export function matchesGlob(relativePath: string, glob: string): boolean {
  const extensionMatch = glob.match(/\.\{([^}]+)\}$/);
  if (extensionMatch) {
    const extensions = extensionMatch[1].split(',');
    const baseGlob = glob.replace(/\.\{[^}]+\}$/, '');
    return extensions.some((ext) => matchesGlob(relativePath, `${baseGlob}.${ext.trim()}`));
  }

  // Glob wildcards are swapped for placeholders before any regex syntax goes in
  const pattern = glob
    .replace(/[.+^$()|[\]\\]/g, '\\$&')
    .replace(/\?/g, '[^/]')
    .replace(/\*\*\//g, '{{DOUBLE_STAR_SLASH}}')
    .replace(/\*\*/g, '{{DOUBLE_STAR}}')
    .replace(/\*/g, '[^/]*')
    .replace(/{{DOUBLE_STAR_SLASH}}/g, '(.*\\/)?')
    .replace(/{{DOUBLE_STAR}}/g, '.*');

  return new RegExp(`^${pattern}$`).test(relativePath);
}

// ============================================================================
// Traversal
// ============================================================================

function isSkippedDirectory(name: string): boolean {
  return name.startsWith('.') || name === 'node_modules';
}

async function* walk(dir: string, baseDir: string, glob: string): AsyncGenerator<CorpusEntry> {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    // Without the listing its documents would look deleted
    throw new CorpusReadError(dir, { cause: error });
  }

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      if (isSkippedDirectory(entry.name)) continue;
      yield* walk(fullPath, baseDir, glob);
      continue;
    }

    if (!entry.isFile()) continue;

    const relativePath = normalizeRelativePath(path.relative(baseDir, fullPath));
    if (!matchesGlob(relativePath, glob)) continue;

    try {
      const content = utf8.decode(await readFile(fullPath));
      yield {
        kind: 'document',
        document: { path: relativePath, content, size: contentLength(content) },
      };
    } catch (error) {
      yield { kind: 'unreadable', path: relativePath, error: describeError(error) };
    }
  }
}

export async function assertCorpusRoot(root: string): Promise<void> {
  let info;
  try {
    info = await stat(root);
  } catch (error) {
    throw new ConfigError(`Corpus root not found: ${root} (${describeError(error)})`);
  }
  if (!info.isDirectory()) {
    throw new ConfigError(`Corpus root is not a directory: ${root}`);
  }
}

export async function* readCorpus(
  root: string,
  options: ReadCorpusOptions = {}
): AsyncGenerator<CorpusEntry> {
  const { glob = DEFAULT_DOCUMENT_GLOB } = options;
  const absoluteRoot = path.resolve(root);

  await assertCorpusRoot(absoluteRoot);

  try {
    yield* walk(absoluteRoot, absoluteRoot, glob);
  } catch (error) {
    // An unlistable root is a configuration problem, not a corpus one
    if (error instanceof CorpusReadError && error.path === absoluteRoot) {
      throw new ConfigError(`Corpus root is not readable: ${root} (${describeError(error.cause)})`);
    }
    throw error;
  }
}
