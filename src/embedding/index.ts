// Embedding providers

import type { EmbeddingProvider, EmbeddingConfig } from "../types";
import { EMBEDDING_PROVIDERS } from "../config";
import { LocalEmbeddingProvider } from "./local";
import { OpenAIEmbeddingProvider } from "./openai";
import { VoyageEmbeddingProvider } from "./voyage";
import { CohereEmbeddingProvider } from "./cohere";

export { LocalEmbeddingProvider, OpenAIEmbeddingProvider, VoyageEmbeddingProvider, CohereEmbeddingProvider };
export { BatchedEmbeddingProvider, RemoteServiceError, postJson, requireApiKey } from "./remote";
export type { EmbeddingPurpose, ServiceRole } from "./remote";
export { fetchWithRetry, backoffDelay, retryAfterDelay } from "./retry";
export type { RetryOptions } from "./retry";

type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number];

const FACTORIES: Record<EmbeddingProviderName, (config: EmbeddingConfig) => EmbeddingProvider> = {
  local: () => new LocalEmbeddingProvider(),
  openai: config => new OpenAIEmbeddingProvider(config),
  voyage: config => new VoyageEmbeddingProvider(config),
  cohere: config => new CohereEmbeddingProvider(config),
};

/** Build the provider named by `embedding.provider` (local when unset) */
export async function createEmbeddingProvider(
  config: EmbeddingConfig = { provider: "local" }
): Promise<EmbeddingProvider> {
  const name = EMBEDDING_PROVIDERS.find(candidate => candidate === config.provider);
  if (!name) {
    throw new Error(
      `Unknown embedding provider "${config.provider}"; expected one of ${EMBEDDING_PROVIDERS.join(", ")}`
    );
  }
  return FACTORIES[name](config);
}
