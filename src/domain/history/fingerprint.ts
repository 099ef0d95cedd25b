import { createHash } from 'node:crypto';

/**
 * Fingerprint a question for exact-duplicate detection.
 * SHA-256 over the trimmed, lower-cased text; rephrasings hash differently.
 */
export function fingerprintQuestion(text: string): string {
  return createHash('sha256').update(text.trim().toLowerCase()).digest('hex');
}
