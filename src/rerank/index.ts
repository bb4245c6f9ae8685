// Rerank providers

import type { RerankConfig, RerankProvider } from "../types";
import { RERANK_PROVIDERS } from "../config";
import { LocalRerankProvider } from "./local";
import { CohereRerankProvider } from "./cohere";
import { VoyageRerankProvider } from "./voyage";

export { LocalRerankProvider, CohereRerankProvider, VoyageRerankProvider };
export { scorePair } from "./local";
export { groupByQuery } from "./pairs";

type RerankProviderName = (typeof RERANK_PROVIDERS)[number];

const FACTORIES: Record<RerankProviderName, (config: RerankConfig) => RerankProvider> = {
  local: () => new LocalRerankProvider(),
  cohere: config => new CohereRerankProvider(config),
  voyage: config => new VoyageRerankProvider(config),
};

/** Build the provider named by `rerank.provider` (local when unset) */
export async function createRerankProvider(
  config: RerankConfig = { provider: "local" }
): Promise<RerankProvider> {
  const name = RERANK_PROVIDERS.find(candidate => candidate === config.provider);
  if (!name) {
    throw new Error(
      `Unknown rerank provider "${config.provider}"; expected one of ${RERANK_PROVIDERS.join(", ")}`
    );
  }
  return FACTORIES[name](config);
}
