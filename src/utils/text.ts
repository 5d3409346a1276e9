/**
 * Text normalization shared by the query builder, the ranking engine and
 * the suggestion index, so query terms and indexed tokens always agree.
 */

// Any script's letters and digits are term characters; marks left by NFKD are dropped.
const COMBINING_MARKS = /\p{M}/gu;
const TOKEN_SPLIT = /[^\p{L}\p{N}]+/u;

export function normalizeText(value: string): string {
  return value.normalize('NFKD').replace(COMBINING_MARKS, '').toLowerCase().trim();
}

export function tokenize(value: string): string[] {
  return normalizeText(value).split(TOKEN_SPLIT).filter((token) => token.length > 0);
}

/**
 * Lowercased, accent-stripped, de-duplicated terms in first-seen order.
 */
export function uniqueTerms(value: string): string[] {
  return Array.from(new Set(tokenize(value)));
}

/** Normalized keyword used for term filters and epoch ids */
export function normalizeKeyword(value: string): string {
  return normalizeText(value).replace(/\s+/g, ' ');
}
