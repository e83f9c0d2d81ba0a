/**
 * Vectorizer - Fingerprinting
 *
 * Stable identities and content hashes. Same input, same output, on any machine.
 */

import { createHash } from 'crypto';
import path from 'path';

import type { ContentFingerprint, Identity } from '../core/types.js';

function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

export function fingerprint(content: string): ContentFingerprint {
  return sha256(content);
}

export function identityOf(relativePath: string): Identity {
  return sha256(normalizeRelativePath(relativePath));
}

/**
 * Relative paths are hashed with '/' separators so a corpus synced from
 * Windows and from Linux maps onto the same records.
 */
export function normalizeRelativePath(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}
