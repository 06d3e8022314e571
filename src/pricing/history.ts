/**
 * Historical quote lookup for pricing consistency
 */

import type { LedgerStore, QuoteHistoryEntry } from '../ledger/types.js';

const MIN_TERM_LENGTH = 3;

/**
 * Split free text into search terms: lower-case words of three letters or more
 */
export function extractSearchTerms(text: string): string[] {
  const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  return [...new Set(words.filter((word) => word.length >= MIN_TERM_LENGTH))];
}

/**
 * Past quotes whose request or explanation mentions every term in `text`
 */
export function findSimilarQuotes(
  store: LedgerStore,
  text: string | string[],
  limit = 5
): QuoteHistoryEntry[] {
  const terms = Array.isArray(text) ? text : extractSearchTerms(text);
  return store.searchQuoteHistory(terms, limit);
}
