// Hybrid scorer - fuses semantic similarity with lexical overlap

import type { DegradedStage, ScoredCandidate } from "../types";
import { keywordOverlap } from "./keyword";
import { cosineSimilarity } from "./similarity";

export interface IndexSnapshot {
  readonly chunks: readonly string[];
  readonly urls: readonly string[];
  readonly embeddings: readonly number[][];
  readonly builtAt: number;
  /** Set when the snapshot was built without embeddings */
  readonly degraded?: readonly DegradedStage[];
}

export interface HybridScoreOptions {
  /** Number of candidates kept before the minScore filter */
  limit: number;
  weight: number;
  minScore: number;
}

export function fuseScores(semantic: number, keyword: number, weight: number): number {
  return semantic * weight + keyword * (1 - weight);
}

/**
 * Score every chunk of the snapshot and keep the best `limit` whose fused
 * score reaches `minScore`. A null query vector scores lexically only.
 */
export function scoreHybrid(
  query: string,
  queryVector: number[] | null,
  snapshot: IndexSnapshot,
  options: HybridScoreOptions
): ScoredCandidate[] {
  const degraded: DegradedStage[] = queryVector ? [] : ["embedding"];

  const scored = snapshot.chunks.map((content, i): ScoredCandidate => {
    const embedding = snapshot.embeddings[i];
    const semanticScore = queryVector && embedding ? cosineSimilarity(queryVector, embedding) : 0;
    const keywordScore = keywordOverlap(query, content);
    return {
      url: snapshot.urls[i] ?? "unknown",
      content,
      semanticScore,
      keywordScore,
      finalScore: fuseScores(semanticScore, keywordScore, options.weight),
      degraded: [...degraded],
    };
  });

  return scored
    .sort((a, b) => b.finalScore - a.finalScore)
    .slice(0, Math.max(0, options.limit))
    .filter(candidate => candidate.finalScore >= options.minScore);
}
