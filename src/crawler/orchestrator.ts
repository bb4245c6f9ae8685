// Search orchestrator - coordinates crawl, index build, hybrid search and summary

import type {
  CrawlOptions,
  CrawlRequest,
  CrawlResponse,
  CrawlResult,
  IndexBuildJob,
  IndexBuildStatus,
  IndexStats,
  Page,
  SiteseekConfig,
  SearchConfig,
  SearchRequest,
  SearchResponse,
  SearchResult,
  Summarizer,
} from "../types";
import { join } from "path";
import { getDataPaths, loadConfig } from "../config";
import { createEmbeddingProvider } from "../embedding";
import { createRerankProvider } from "../rerank";
import { IndexNotBuiltError, RetrievalIndex } from "../retrieval/index-store";
import { Reranker } from "../retrieval/reranker";
import { ExtractiveSummarizer } from "../summarizer";
import { createSiteCrawler } from "./crawler";
import { Semaphore } from "./semaphore";

export const NO_RELEVANT_INFORMATION = "No relevant information found.";
export const SUMMARY_UNAVAILABLE = "Unable to summarize content.";

export interface SiteCrawlerLike {
  crawl(seedUrl: string, options?: CrawlOptions): Promise<CrawlResult>;
}

export interface SearchOrchestratorOptions {
  index: RetrievalIndex;
  /** Called once per seed so every crawl owns its own queue, visited set and session */
  createCrawler: () => SiteCrawlerLike;
  summarizer?: Summarizer;
  search?: Partial<Pick<SearchConfig, "topK" | "fallbackSeedUrl" | "fallbackMaxPages">>;
  crawl?: Pick<CrawlOptions, "maxPages" | "maxDepth">;
}

export interface MergedCrawl {
  pages: Page[];
  blocked: string[];
  failed: string[];
}

export interface BuildStatus {
  job: { id: string; status: IndexBuildStatus; startedAt: number } | null;
  index: IndexStats;
}

export class SearchOrchestrator {
  readonly index: RetrievalIndex;
  private createCrawler: () => SiteCrawlerLike;
  private summarizer: Summarizer | null;
  private topK: number;
  private fallbackSeedUrl: string | null;
  private fallbackMaxPages: number;
  private crawlLimits: Pick<CrawlOptions, "maxPages" | "maxDepth">;
  /** Held from the start of an index build until the search over it has run */
  private indexLock = new Semaphore(1);

  constructor(options: SearchOrchestratorOptions) {
    this.index = options.index;
    this.createCrawler = options.createCrawler;
    this.summarizer = options.summarizer ?? null;
    this.topK = options.search?.topK ?? 5;
    this.fallbackSeedUrl = options.search?.fallbackSeedUrl ?? null;
    this.fallbackMaxPages = options.search?.fallbackMaxPages ?? 2;
    this.crawlLimits = options.crawl ?? {};
  }

  /** Crawl several seeds at once; each crawl is independent */
  async crawlSites(urls: string[], query: string): Promise<MergedCrawl> {
    const results = await Promise.all(
      urls.map(url => this.createCrawler().crawl(url, { ...this.crawlLimits, query }))
    );
    return mergeCrawls(results);
  }

  async crawl(request: CrawlRequest): Promise<CrawlResponse> {
    const seeds = seedsOf(request);
    const merged = await this.crawlSites(seeds, "");

    if (merged.pages.length === 0) {
      return {
        success: false,
        message: "No pages found, possibly blocked by robots.txt.",
        pages: 0,
        blocked: merged.blocked,
        failed: merged.failed,
        buildJobId: null,
      };
    }

    await this.indexLock.acquire();
    let job: IndexBuildJob;
    try {
      job = this.index.startBuild(merged.pages);
    } catch (error) {
      this.indexLock.release();
      throw error;
    }
    void job.done
      .then(outcome => {
        if (outcome.status === "failed") {
          console.error(`[search] Background index build ${job.id} failed: ${outcome.error ?? "unknown error"}`);
        }
      })
      .finally(() => this.indexLock.release());

    let message = `Crawled ${merged.pages.length} pages successfully.`;
    if (merged.blocked.length > 0) {
      message += ` ${merged.blocked.length} URLs blocked by robots.txt.`;
    }

    return {
      success: true,
      message,
      pages: merged.pages.length,
      blocked: merged.blocked,
      failed: merged.failed,
      buildJobId: job.id,
    };
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    const query = request.query.trim();
    const merged: MergedCrawl = { pages: [], blocked: [], failed: [] };

    // primary and secondary seeds are crawled one after the other
    for (const seed of seedsOf(request)) {
      console.log(`[search] Crawling ${seed} for "${query}"`);
      appendCrawl(merged, await this.crawlSites([seed], query));
    }

    if (merged.pages.length === 0 && this.fallbackSeedUrl) {
      console.warn(`[search] No data from seeds, crawling ${this.fallbackSeedUrl}`);
      const fallback = await this.createCrawler().crawl(this.fallbackSeedUrl, {
        maxPages: this.fallbackMaxPages,
        maxDepth: this.crawlLimits.maxDepth,
        query: "",
      });
      appendCrawl(merged, mergeCrawls([fallback]));
    }

    if (merged.pages.length === 0) {
      return this.noRelevantInformation(query, merged);
    }

    const results = await this.indexLock.run(() => this.buildAndSearch(query, merged.pages));
    if (results.length === 0) {
      return this.noRelevantInformation(query, merged);
    }

    const summary = request.smart
      ? await this.summarize(results.map(r => r.content).join(" "), query)
      : null;

    console.log(`[search] Complete for "${query}": ${results.length} results`);

    return {
      success: true,
      query,
      summary,
      results,
      blocked: merged.blocked,
      failed: merged.failed,
      pages: merged.pages.length,
    };
  }

  /** Rebuild the index from `pages` and search it; empty when nothing could be indexed */
  private async buildAndSearch(query: string, pages: Page[]): Promise<SearchResult[]> {
    const outcome = await this.index.build(pages);
    if (outcome.status === "failed" || outcome.status === "cancelled") {
      console.error(`[search] Index build ${outcome.status}: ${outcome.error ?? "unknown error"}`);
      return [];
    }
    if (outcome.degraded?.includes("embedding")) {
      console.warn(`[search] Index for "${query}" built without embeddings, ranking by keywords only`);
    }

    try {
      return await this.index.search(query, { topK: this.topK });
    } catch (error) {
      if (error instanceof IndexNotBuiltError) return [];
      throw error;
    }
  }

  /** State of one build job (the latest when no id is given) plus the live index */
  getBuildStatus(jobId?: string): BuildStatus {
    const job = jobId ? this.index.getJob(jobId) : this.index.latestJob;
    return {
      job: job ? { id: job.id, status: job.status, startedAt: job.startedAt } : null,
      index: this.index.stats(),
    };
  }

  private async summarize(text: string, query: string): Promise<string> {
    if (!this.summarizer) return SUMMARY_UNAVAILABLE;
    try {
      return await this.summarizer.summarize(text, query);
    } catch (error) {
      console.warn("[search] Summarizer error:", error);
      return SUMMARY_UNAVAILABLE;
    }
  }

  private noRelevantInformation(query: string, merged: MergedCrawl): SearchResponse {
    return {
      success: true,
      query,
      summary: NO_RELEVANT_INFORMATION,
      results: [],
      blocked: merged.blocked,
      failed: merged.failed,
      pages: merged.pages.length,
    };
  }
}

function seedsOf(request: { url?: string; url2?: string }): string[] {
  return [request.url, request.url2]
    .map(url => url?.trim() ?? "")
    .filter(url => url.length > 0);
}

function mergeCrawls(results: CrawlResult[]): MergedCrawl {
  const merged: MergedCrawl = { pages: [], blocked: [], failed: [] };
  for (const result of results) {
    merged.pages.push(...result.pages);
    merged.blocked.push(...result.blocked);
    merged.failed.push(...result.failed);
  }
  return merged;
}

function appendCrawl(target: MergedCrawl, source: MergedCrawl): void {
  target.pages.push(...source.pages);
  target.blocked.push(...source.blocked);
  target.failed.push(...source.failed);
}

export async function createOrchestrator(config: SiteseekConfig): Promise<SearchOrchestrator> {
  const [, crawlsDir, logsDir, indexDir] = getDataPaths(config.dataDir);
  const embeddingProvider = await createEmbeddingProvider(config.embedding);
  const rerankProvider = await createRerankProvider(config.rerank);

  const index = new RetrievalIndex({
    embeddingProvider,
    reranker: new Reranker(rerankProvider),
    persistPath: join(indexDir, "embeddings.json"),
    overFetch: config.search.overFetch,
    defaults: {
      topK: config.search.topK,
      weight: config.search.weight,
      minScore: config.search.minScore,
    },
  });

  return new SearchOrchestrator({
    index,
    createCrawler: () =>
      createSiteCrawler(config.crawler, {
        outputDir: crawlsDir,
        auditLogPath: join(logsDir, "robots_log.txt"),
      }),
    summarizer: new ExtractiveSummarizer(),
    search: config.search,
    crawl: { maxPages: config.crawler.maxPages, maxDepth: config.crawler.maxDepth },
  });
}

let orchestrator: Promise<SearchOrchestrator> | null = null;

export function getOrchestrator(): Promise<SearchOrchestrator> {
  if (!orchestrator) {
    orchestrator = loadConfig()
      .then(createOrchestrator)
      .catch(error => {
        orchestrator = null;
        throw error;
      });
  }
  return orchestrator;
}

export function resetOrchestrator(): void {
  orchestrator = null;
}
