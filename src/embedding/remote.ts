// Hosted embedding and rerank APIs: authenticated JSON POSTs with retry and validated replies

import type { z } from "zod/v4";
import type { EmbeddingProvider } from "../types";
import { fetchWithRetry } from "./retry";

export type ServiceRole = "embedding" | "rerank";

export class RemoteServiceError extends Error {
  constructor(
    readonly service: string,
    readonly status: number,
    detail: string
  ) {
    super(`${service} returned HTTP ${status}: ${detail}`);
    this.name = "RemoteServiceError";
  }
}

export function requireApiKey(service: string, role: ServiceRole, apiKey: string | undefined): string {
  if (!apiKey) {
    throw new Error(
      `${service} ${role} needs an API key (${role}.apiKey or SITESEEK_${role.toUpperCase()}_API_KEY)`
    );
  }
  return apiKey;
}

export async function postJson<T>(
  service: string,
  url: string,
  apiKey: string,
  body: unknown,
  reply: z.ZodType<T>
): Promise<T> {
  const response = await fetchWithRetry(url, {
    method: "POST",
    headers: {
      "Authorization": `Bearer ${apiKey}`,
      "Content-Type": "application/json",
    },
    body: JSON.stringify(body),
  });

  if (!response.ok) {
    throw new RemoteServiceError(service, response.status, await response.text());
  }

  const parsed = reply.safeParse(await response.json());
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.map(String).join(".")}: ${issue.message}`);
    throw new Error(`${service} sent an unexpected reply (${problems.join("; ")})`);
  }
  return parsed.data;
}

export type EmbeddingPurpose = "document" | "query";

/**
 * Base for APIs that embed a list of texts per request. Chunks are sent in
 * batches as documents; a search query is sent alone as a query.
 */
export abstract class BatchedEmbeddingProvider implements EmbeddingProvider {
  abstract readonly name: string;
  abstract readonly dimensions: number;

  constructor(private readonly batchSize: number) {}

  protected abstract request(texts: string[], purpose: EmbeddingPurpose): Promise<number[][]>;

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      const batchVectors = await this.request(batch, "document");
      if (batchVectors.length !== batch.length) {
        throw new Error(`${this.name} embedded ${batchVectors.length} of ${batch.length} texts`);
      }
      vectors.push(...batchVectors);
    }

    return vectors;
  }

  async embedSingle(text: string): Promise<number[]> {
    const [vector] = await this.request([text], "query");
    if (!vector) {
      throw new Error(`${this.name} returned no vector for the query`);
    }
    return vector;
  }
}
