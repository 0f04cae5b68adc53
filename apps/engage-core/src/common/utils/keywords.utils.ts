/**
 * Keyword utilities
 *
 * Derive the interest keywords stored on a user from free text
 * (event name + description).
 */
import { INTEREST_MAX_DISCARDED_LENGTH } from '@engage/shared';
import stopWordList from './stop-words.json';

export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

/**
 * Extract lowercase keywords from text.
 *
 * Tokens are runs of letters and digits. Tokens of length
 * INTEREST_MAX_DISCARDED_LENGTH or less and stop words are dropped.
 * The result is deduplicated and sorted.
 *
 * @example
 * extractKeywords('AI Conference: Explore the future of AI');
 * // ['conference', 'explore', 'future']
 */
export function extractKeywords(text: string): string[] {
  const tokens = text.toLowerCase().split(/[^\p{L}\p{N}]+/u);
  const keywords = new Set<string>();

  for (const token of tokens) {
    if (token.length <= INTEREST_MAX_DISCARDED_LENGTH) {
      continue;
    }
    if (STOP_WORDS.has(token)) {
      continue;
    }
    keywords.add(token);
  }

  return [...keywords].sort();
}

/**
 * Union of existing interests and new keywords, lowercase, deduplicated, sorted.
 */
export function mergeKeywords(existing: readonly string[], added: readonly string[]): string[] {
  const merged = new Set<string>();
  for (const keyword of [...existing, ...added]) {
    const normalized = keyword.trim().toLowerCase();
    if (normalized) {
      merged.add(normalized);
    }
  }
  return [...merged].sort();
}
