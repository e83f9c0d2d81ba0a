/**
 * Vectorizer - Admission Policy
 *
 * Oversized documents are not skipped: they are truncated to the limit,
 * embedded and stored, and the run is flagged so the operator notices.
 */

export const DEFAULT_MAX_CONTENT_LENGTH = 10000;

export interface Admission {
  content: string;
  admitted: boolean;
}

/** Length in code points (the unit the limit is expressed in). */
export function contentLength(content: string): number {
  return Array.from(content).length;
}

export function admit(content: string, limit: number = DEFAULT_MAX_CONTENT_LENGTH): Admission {
  // Cheap path: UTF-16 length is an upper bound on code points
  if (content.length <= limit) {
    return { content, admitted: true };
  }

  const codePoints = Array.from(content);
  if (codePoints.length <= limit) {
    return { content, admitted: true };
  }

  return { content: codePoints.slice(0, limit).join(''), admitted: false };
}
