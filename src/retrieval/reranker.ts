// Second-stage reranker over hybrid candidates

import type { DegradedStage, RerankProvider, ScoredCandidate, SearchResult } from "../types";

export class Reranker {
  constructor(private readonly provider: RerankProvider) {}

  get providerName(): string {
    return this.provider.name;
  }

  /**
   * Order candidates by pairwise relevance, best first, keeping at most topK.
   * When the provider fails, the incoming order is kept and marked degraded.
   */
  async rerank(query: string, candidates: ScoredCandidate[], topK = 5): Promise<SearchResult[]> {
    if (candidates.length === 0) {
      return [];
    }

    let scores: number[];
    try {
      scores = await this.provider.score(candidates.map((c): [string, string] => [query, c.content]));
      if (scores.length !== candidates.length) {
        throw new Error(`expected ${candidates.length} scores, got ${scores.length}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[rerank] ${this.provider.name} reranker failed, keeping hybrid order: ${message}`);
      return candidates.slice(0, topK).map((c): SearchResult => {
        const degraded: DegradedStage[] = [...c.degraded, "rerank"];
        return { ...c, rerankScore: null, degraded };
      });
    }

    return candidates
      .map((c, i): SearchResult & { rerankScore: number } => ({ ...c, rerankScore: scores[i] ?? 0 }))
      .sort((a, b) => b.rerankScore - a.rerankScore)
      .slice(0, topK);
  }
}
