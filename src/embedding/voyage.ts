// Voyage AI embeddings endpoint

import { z } from "zod/v4";
import type { EmbeddingConfig } from "../types";
import { BatchedEmbeddingProvider, postJson, requireApiKey, type EmbeddingPurpose } from "./remote";

const VoyageReplySchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })),
});

export class VoyageEmbeddingProvider extends BatchedEmbeddingProvider {
  readonly name = "voyage";
  readonly dimensions = 1024;

  private readonly apiKey: string;
  private readonly model: string;
  private readonly endpoint: string;

  constructor(config: EmbeddingConfig) {
    super(config.batchSize || 32);
    this.apiKey = requireApiKey("Voyage", "embedding", config.apiKey);
    this.model = config.model || "voyage-3";
    this.endpoint = `${config.apiBase || "https://api.voyageai.com/v1"}/embeddings`;
  }

  protected async request(texts: string[], purpose: EmbeddingPurpose): Promise<number[][]> {
    const reply = await postJson(
      "Voyage embeddings",
      this.endpoint,
      this.apiKey,
      { input: texts, model: this.model, input_type: purpose },
      VoyageReplySchema
    );
    return reply.data.map(item => item.embedding);
  }
}
