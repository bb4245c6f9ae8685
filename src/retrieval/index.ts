// Retrieval module barrel export

export { SentenceChunker, chunkPages } from "./chunker";
export { keywordTokens, keywordOverlap } from "./keyword";
export { cosineSimilarity, similarity } from "./similarity";
export { fuseScores, scoreHybrid } from "./hybrid";
export type { IndexSnapshot, HybridScoreOptions } from "./hybrid";
export { Reranker } from "./reranker";
export { RetrievalIndex, IndexNotBuiltError, BuildCancelledError } from "./index-store";
export type { PersistedIndex, RetrievalIndexOptions } from "./index-store";
