// Keyword signal counting over scenario text.
// A term matches where it starts a word, so "risk" counts in "risks" and
// "risky" but not in "asterisk". Matching is case-insensitive.

const cache = new Map<string, RegExp>();

function termPattern(term: string): RegExp {
  let pattern = cache.get(term);
  if (!pattern) {
    const escaped = term.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    pattern = new RegExp(`(?<![a-z0-9])${escaped}`, 'g');
    cache.set(term, pattern);
  }
  pattern.lastIndex = 0;
  return pattern;
}

/** Occurrences of `term` in already-lowercased text */
export function countTerm(text: string, term: string): number {
  return text.match(termPattern(term))?.length ?? 0;
}

export function countTerms(text: string, terms: readonly string[]): number {
  return terms.reduce((sum, term) => sum + countTerm(text, term), 0);
}

/** Number of distinct terms that occur at least once */
export function presentTerms(text: string, terms: readonly string[]): number {
  return terms.filter(term => countTerm(text, term) > 0).length;
}

export function mentionsAny(text: string, terms: readonly string[]): boolean {
  return terms.some(term => countTerm(text, term) > 0);
}

/**
 * Pick the dominant of three graded levels by how many of each level's
 * phrases appear. Ties fall to the lower grade; `fallback` is returned
 * when no phrase of any level appears.
 */
export function dominantLevel<L extends string>(
  text: string,
  levels: readonly [high: L, medium: L, low: L],
  phrases: Readonly<Record<L, readonly string[]>>,
  fallback: L = levels[2],
): L {
  const [high, medium, low] = levels;
  const h = presentTerms(text, phrases[high]);
  const m = presentTerms(text, phrases[medium]);
  const l = presentTerms(text, phrases[low]);
  if (h + m + l === 0) return fallback;
  if (h > m && h > l) return high;
  if (m > l) return medium;
  return low;
}

export function splitSentences(text: string): string[] {
  return text.split(/[.!?\n]+/).map(s => s.trim()).filter(Boolean);
}
