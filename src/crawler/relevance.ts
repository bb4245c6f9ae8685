// Query-aware truncation of page text and the crawl's early-exit hit count

const MIN_SEGMENT_WORDS = 6;
const MAX_SEGMENTS = 6;

export function queryTerms(query: string): string[] {
  return query.toLowerCase().split(/\s+/).filter(Boolean);
}

/**
 * Keep the (at most six) sentence-like segments sharing the most words with
 * the query, best first. Returns the text untouched when the query is empty.
 */
export function rankTextByQuery(text: string, query: string): string {
  const terms = new Set(queryTerms(query));
  if (terms.size === 0) return text;

  const segments = text
    .split(".")
    .map(segment => segment.trim())
    .filter(segment => segment.split(/\s+/).filter(Boolean).length > MIN_SEGMENT_WORDS);

  const overlap = (segment: string): number => {
    const words = new Set(segment.toLowerCase().split(/\s+/));
    let count = 0;
    for (const term of terms) {
      if (words.has(term)) count++;
    }
    return count;
  };

  // Array.prototype.sort is stable, ties keep document order
  return segments
    .map(segment => ({ segment, score: overlap(segment) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, MAX_SEGMENTS)
    .map(entry => entry.segment)
    .join(". ");
}

/** Number of distinct query terms occurring anywhere in the text */
export function countQueryHits(text: string, query: string): number {
  const haystack = text.toLowerCase();
  let hits = 0;
  for (const term of new Set(queryTerms(query))) {
    if (haystack.includes(term)) hits++;
  }
  return hits;
}
