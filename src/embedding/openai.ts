// OpenAI embeddings endpoint

import { z } from "zod/v4";
import type { EmbeddingConfig } from "../types";
import { BatchedEmbeddingProvider, postJson, requireApiKey } from "./remote";

const OpenAIReplySchema = z.object({
  data: z.array(z.object({ index: z.number().int(), embedding: z.array(z.number()) })),
});

export class OpenAIEmbeddingProvider extends BatchedEmbeddingProvider {
  readonly name = "openai";
  readonly dimensions: number;

  private readonly apiKey: string;
  private readonly model: string;
  private readonly endpoint: string;

  constructor(config: EmbeddingConfig) {
    super(config.batchSize || 64);
    this.apiKey = requireApiKey("OpenAI", "embedding", config.apiKey);
    this.model = config.model || "text-embedding-3-small";
    this.endpoint = `${config.apiBase || "https://api.openai.com/v1"}/embeddings`;
    this.dimensions = this.model.includes("3-large") ? 3072 : 1536;
  }

  // queries and documents share one input format here
  protected async request(texts: string[]): Promise<number[][]> {
    const reply = await postJson(
      "OpenAI embeddings",
      this.endpoint,
      this.apiKey,
      { input: texts, model: this.model },
      OpenAIReplySchema
    );
    return reply.data.sort((a, b) => a.index - b.index).map(item => item.embedding);
  }
}
