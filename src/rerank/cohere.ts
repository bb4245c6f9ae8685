// Cohere rerank endpoint

import { z } from "zod/v4";
import type { RerankConfig, RerankProvider } from "../types";
import { postJson, requireApiKey } from "../embedding/remote";
import { groupByQuery } from "./pairs";

const CohereRerankReplySchema = z.object({
  results: z.array(z.object({ index: z.number().int(), relevance_score: z.number() })),
});

export class CohereRerankProvider implements RerankProvider {
  readonly name = "cohere";

  private readonly apiKey: string;
  private readonly model: string;
  private readonly endpoint: string;

  constructor(config: RerankConfig) {
    this.apiKey = requireApiKey("Cohere", "rerank", config.apiKey);
    this.model = config.model || "rerank-english-v3.0";
    this.endpoint = `${config.apiBase || "https://api.cohere.ai/v1"}/rerank`;
  }

  async score(pairs: Array<[query: string, text: string]>): Promise<number[]> {
    const scores = new Array<number>(pairs.length).fill(0);

    for (const group of groupByQuery(pairs)) {
      const reply = await postJson(
        "Cohere rerank",
        this.endpoint,
        this.apiKey,
        { query: group.query, documents: group.documents, model: this.model, top_n: group.documents.length },
        CohereRerankReplySchema
      );
      for (const result of reply.results) {
        const position = group.positions[result.index];
        if (position !== undefined) scores[position] = result.relevance_score;
      }
    }

    return scores;
  }
}
