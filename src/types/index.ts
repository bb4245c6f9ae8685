// Core types and interfaces for siteseek

export interface Page {
  url: string;
  content: string;
}

export interface CrawlTask {
  url: string;
  depth: number;
}

export interface CrawlOptions {
  /** Stop once this many pages have been collected */
  maxPages?: number;
  /** Links discovered at this depth are not followed */
  maxDepth?: number;
  /** Used for query-aware ranking and early termination ("" disables both) */
  query?: string;
}

export interface CrawlResult {
  seedUrl: string;
  domain: string;
  pages: Page[];
  /** URLs denied (or left unreadable) by the policy gate */
  blocked: string[];
  /** URLs that were allowed but yielded no page */
  failed: string[];
  visited: string[];
  stoppedEarly: boolean;
  fallbackUrl: string | null;
  savedTo: string | null;
}

export type PolicyDecision = "allowed" | "blocked" | "unreadable";

export interface PolicyGate {
  allowed(url: string): Promise<boolean>;
}

export interface Fetcher {
  fetch(url: string): Promise<string | null>;
}

export interface Extractor {
  extract(html: string): string;
  links(html: string, baseUrl: string, domain: string): Set<string>;
}

export interface Chunker {
  chunk(text: string, maxLength?: number): string[];
}

export interface Chunk {
  text: string;
  sourceUrl: string;
}

export type DegradedStage = "embedding" | "rerank";

export interface SearchResult {
  url: string;
  content: string;
  semanticScore: number;
  keywordScore: number;
  finalScore: number;
  /** null when the reranker was unavailable for this query */
  rerankScore: number | null;
  degraded: DegradedStage[];
}

export type ScoredCandidate = Omit<SearchResult, "rerankScore">;

export interface SearchOptions {
  topK?: number;
  weight?: number;
  minScore?: number;
}

export interface EmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  embed(texts: string[]): Promise<number[][]>;
  embedSingle(text: string): Promise<number[]>;
}

export interface RerankProvider {
  readonly name: string;
  /** One relevance score per (query, text) pair, in input order */
  score(pairs: Array<[query: string, text: string]>): Promise<number[]>;
}

export interface Summarizer {
  summarize(text: string, query?: string): Promise<string>;
}

export type IndexBuildStatus = "running" | "completed" | "empty" | "failed" | "cancelled";

export interface IndexBuildOutcome {
  status: Exclude<IndexBuildStatus, "running">;
  chunkCount: number;
  pageCount: number;
  savedTo: string | null;
  /** Stages skipped by a build that still completed */
  degraded?: DegradedStage[];
  error?: string;
}

export interface IndexBuildJob {
  readonly id: string;
  readonly status: IndexBuildStatus;
  readonly startedAt: number;
  readonly done: Promise<IndexBuildOutcome>;
  cancel(): void;
}

export interface IndexStats {
  built: boolean;
  chunkCount: number;
  pageCount: number;
  cachedQueries: number;
  builtAt: number | null;
}

export interface SiteseekConfig {
  /** Data directory (defaults to ~/.siteseek) */
  dataDir: string;

  crawler: CrawlerConfig;

  search: SearchConfig;

  embedding: EmbeddingConfig;

  rerank: RerankConfig;

  worker: WorkerConfig;
}

export interface CrawlerConfig {
  maxPages: number;
  maxDepth: number;
  /** Capacity of the fetch concurrency gate */
  concurrency: number;
  /** Per-request timeout (ms) */
  timeout: number;
  /** Pause between fetch iterations (ms) */
  politeDelay: number;
  /** Reuse a parsed robots.txt per origin within one crawl */
  cacheRobots: boolean;
  /** Reference pages are looked up as `${fallbackBaseUrl}${Brand}` */
  fallbackBaseUrl: string;
  acceptLanguage: string;
}

export interface SearchConfig {
  topK: number;
  /** Weight of the semantic score in the fused score (0-1) */
  weight: number;
  minScore: number;
  /** Candidates handed to the reranker = topK * overFetch */
  overFetch: number;
  fallbackSeedUrl: string;
  fallbackMaxPages: number;
}

export interface EmbeddingConfig {
  /** Provider type: "local" | "openai" | "voyage" | "cohere" */
  provider: string;
  model?: string;
  apiKey?: string;
  apiBase?: string;
  batchSize?: number;
}

export interface RerankConfig {
  /** Provider type: "local" | "cohere" | "voyage" */
  provider: string;
  model?: string;
  apiKey?: string;
  apiBase?: string;
}

export interface WorkerConfig {
  port: number;
  host: string;
}

export interface CrawlRequest {
  url?: string;
  url2?: string;
}

export interface CrawlResponse {
  success: boolean;
  message: string;
  pages: number;
  blocked: string[];
  failed: string[];
  buildJobId: string | null;
}

export interface SearchRequest {
  query: string;
  url?: string;
  url2?: string;
  smart?: boolean;
}

export interface SearchResponse {
  success: boolean;
  query: string;
  summary: string | null;
  results: SearchResult[];
  blocked: string[];
  failed: string[];
  pages: number;
}
