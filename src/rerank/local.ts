// Local pairwise relevance scorer - no model, no network

import type { RerankProvider } from "../types";
import { keywordTokens } from "../retrieval/keyword";

const PHRASE_WEIGHT = 0.5;

/**
 * Scores a (query, text) pair jointly: the share of query terms the text
 * contains, plus a bonus for query terms that appear next to each other in
 * the text in the same order. Range 0..1.5.
 */
export class LocalRerankProvider implements RerankProvider {
  readonly name = "local";

  async score(pairs: Array<[query: string, text: string]>): Promise<number[]> {
    return pairs.map(([query, text]) => scorePair(query, text));
  }
}

export function scorePair(query: string, text: string): number {
  const queryTerms = Array.from(keywordTokens(query));
  if (queryTerms.length === 0) return 0;

  const textSequence = text.toLowerCase().match(/\b\w{3,}\b/g) ?? [];
  const textTerms = new Set(textSequence);

  const covered = queryTerms.filter(term => textTerms.has(term)).length;
  const coverage = covered / queryTerms.length;

  const queryPairs = adjacentPairs(query.toLowerCase().match(/\b\w{3,}\b/g) ?? []);
  if (queryPairs.size === 0) return coverage;

  const textPairs = adjacentPairs(textSequence);
  let matchedPairs = 0;
  for (const pair of queryPairs) {
    if (textPairs.has(pair)) matchedPairs++;
  }

  return coverage + PHRASE_WEIGHT * (matchedPairs / queryPairs.size);
}

function adjacentPairs(tokens: string[]): Set<string> {
  const pairs = new Set<string>();
  for (let i = 1; i < tokens.length; i++) {
    pairs.add(`${tokens[i - 1]} ${tokens[i]}`);
  }
  return pairs;
}
