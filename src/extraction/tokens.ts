/**
 * Lexical matching helpers shared by the knowledge and case retrievers.
 */

const MIN_TOKEN_LENGTH = 3;

const STOPWORDS = new Set([
  'the', 'and', 'for', 'are', 'but', 'not', 'you', 'all', 'any', 'can',
  'had', 'has', 'have', 'was', 'were', 'been', 'with', 'this', 'that',
  'from', 'they', 'will', 'would', 'there', 'their', 'what', 'when',
  'which', 'into', 'than', 'then', 'them', 'its', 'our', 'out', 'after',
  'before', 'while', 'about', 'some', 'also',
]);

/** Lowercase words of at least three characters, minus stopwords, in first-seen order. */
export function tokenize(text: string): string[] {
  const tokens = new Set<string>();
  for (const word of text.toLowerCase().split(/[^a-z0-9_-]+/)) {
    if (word.length >= MIN_TOKEN_LENGTH && !STOPWORDS.has(word)) {
      tokens.add(word);
    }
  }
  return [...tokens];
}

export function jaccard(a: readonly string[], b: readonly string[]): number {
  if (a.length === 0 && b.length === 0) return 0;

  const left = new Set(a);
  const right = new Set(b);
  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }

  return shared / (left.size + right.size - shared);
}

