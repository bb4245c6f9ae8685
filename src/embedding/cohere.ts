// Cohere embed endpoint

import { z } from "zod/v4";
import type { EmbeddingConfig } from "../types";
import { BatchedEmbeddingProvider, postJson, requireApiKey, type EmbeddingPurpose } from "./remote";

const CohereReplySchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

const INPUT_TYPES: Record<EmbeddingPurpose, string> = {
  document: "search_document",
  query: "search_query",
};

export class CohereEmbeddingProvider extends BatchedEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions = 1024;

  private readonly apiKey: string;
  private readonly model: string;
  private readonly endpoint: string;

  constructor(config: EmbeddingConfig) {
    super(config.batchSize || 96);
    this.apiKey = requireApiKey("Cohere", "embedding", config.apiKey);
    this.model = config.model || "embed-english-v3.0";
    this.endpoint = `${config.apiBase || "https://api.cohere.ai/v1"}/embed`;
  }

  protected async request(texts: string[], purpose: EmbeddingPurpose): Promise<number[][]> {
    const reply = await postJson(
      "Cohere embed",
      this.endpoint,
      this.apiKey,
      { texts, model: this.model, input_type: INPUT_TYPES[purpose] },
      CohereReplySchema
    );
    return reply.embeddings;
  }
}
