// Voyage AI rerank endpoint

import { z } from "zod/v4";
import type { RerankConfig, RerankProvider } from "../types";
import { postJson, requireApiKey } from "../embedding/remote";
import { groupByQuery } from "./pairs";

const VoyageRerankReplySchema = z.object({
  data: z.array(z.object({ index: z.number().int(), relevance_score: z.number() })),
});

export class VoyageRerankProvider implements RerankProvider {
  readonly name = "voyage";

  private readonly apiKey: string;
  private readonly model: string;
  private readonly endpoint: string;

  constructor(config: RerankConfig) {
    this.apiKey = requireApiKey("Voyage", "rerank", config.apiKey);
    this.model = config.model || "rerank-2";
    this.endpoint = `${config.apiBase || "https://api.voyageai.com/v1"}/rerank`;
  }

  async score(pairs: Array<[query: string, text: string]>): Promise<number[]> {
    const scores = new Array<number>(pairs.length).fill(0);

    for (const group of groupByQuery(pairs)) {
      const reply = await postJson(
        "Voyage rerank",
        this.endpoint,
        this.apiKey,
        { query: group.query, documents: group.documents, model: this.model },
        VoyageRerankReplySchema
      );
      for (const result of reply.data) {
        const position = group.positions[result.index];
        if (position !== undefined) scores[position] = result.relevance_score;
      }
    }

    return scores;
  }
}
