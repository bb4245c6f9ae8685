// Retrieval index - chunk/url/embedding arrays built as snapshots and swapped atomically

import { randomUUID } from "crypto";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod/v4";
import type {
  Chunker,
  DegradedStage,
  EmbeddingProvider,
  IndexBuildJob,
  IndexBuildOutcome,
  IndexBuildStatus,
  IndexStats,
  Page,
  SearchOptions,
  SearchResult,
} from "../types";
import { SentenceChunker, chunkPages } from "./chunker";
import { scoreHybrid, type IndexSnapshot } from "./hybrid";
import { Reranker } from "./reranker";

export class IndexNotBuiltError extends Error {
  readonly code = "INDEX_NOT_BUILT";

  constructor(message = "Index has not been built; run build() with pages that yield text first") {
    super(message);
    this.name = "IndexNotBuiltError";
  }
}

export class BuildCancelledError extends Error {
  constructor(jobId: string) {
    super(`Index build ${jobId} was cancelled`);
    this.name = "BuildCancelledError";
  }
}

const PersistedIndexSchema = z
  .object({
    chunks: z.array(z.string()),
    urls: z.array(z.string()),
  })
  .refine(data => data.chunks.length === data.urls.length, {
    message: "chunks and urls must have the same length",
  });

export type PersistedIndex = z.infer<typeof PersistedIndexSchema>;

export interface RetrievalIndexOptions {
  embeddingProvider: EmbeddingProvider;
  reranker: Reranker;
  chunker?: Chunker;
  /** Where {chunks, urls} is written after each successful build; null disables */
  persistPath?: string | null;
  /** Candidates passed to the reranker = topK * overFetch */
  overFetch?: number;
  defaults?: SearchOptions;
}

const MAX_TRACKED_JOBS = 20;

class BuildJob implements IndexBuildJob {
  readonly id = randomUUID();
  readonly startedAt = Date.now();
  status: IndexBuildStatus = "running";
  cancelled = false;
  done: Promise<IndexBuildOutcome>;

  constructor(run: (job: BuildJob) => Promise<IndexBuildOutcome>) {
    this.done = run(this).then(outcome => {
      this.status = outcome.status;
      return outcome;
    });
  }

  cancel(): void {
    if (this.status === "running") {
      this.cancelled = true;
    }
  }
}

export class RetrievalIndex {
  private snapshot: IndexSnapshot | null = null;
  private queryCache: Map<string, number[]> = new Map();
  private generation = 0;
  private pendingBuild: Promise<IndexBuildOutcome> | null = null;
  private jobs: Map<string, BuildJob> = new Map();
  private pageCount = 0;

  private embeddingProvider: EmbeddingProvider;
  private reranker: Reranker;
  private chunker: Chunker;
  private persistPath: string | null;
  private overFetch: number;
  private defaults: Required<SearchOptions>;

  constructor(options: RetrievalIndexOptions) {
    this.embeddingProvider = options.embeddingProvider;
    this.reranker = options.reranker;
    this.chunker = options.chunker ?? new SentenceChunker();
    this.persistPath = options.persistPath ?? null;
    this.overFetch = options.overFetch ?? 3;
    this.defaults = {
      topK: options.defaults?.topK ?? 5,
      weight: options.defaults?.weight ?? 0.7,
      minScore: options.defaults?.minScore ?? 0.15,
    };
  }

  get isBuilt(): boolean {
    return this.snapshot !== null;
  }

  /**
   * Start rebuilding from scratch. The new chunk/url/embedding arrays become
   * visible only once the whole build has finished, and only if no newer
   * build was started in the meantime.
   */
  startBuild(pages: Page[]): IndexBuildJob {
    const generation = ++this.generation;
    const job = new BuildJob(j => this.runBuild(j, pages, generation));

    this.jobs.set(job.id, job);
    if (this.jobs.size > MAX_TRACKED_JOBS) {
      const oldest = this.jobs.keys().next();
      if (!oldest.done) this.jobs.delete(oldest.value);
    }

    const pending = job.done;
    this.pendingBuild = pending;
    void pending.finally(() => {
      if (this.pendingBuild === pending) {
        this.pendingBuild = null;
      }
    });

    return job;
  }

  async build(pages: Page[]): Promise<IndexBuildOutcome> {
    return this.startBuild(pages).done;
  }

  getJob(id: string): IndexBuildJob | null {
    return this.jobs.get(id) ?? null;
  }

  get latestJob(): IndexBuildJob | null {
    let latest: BuildJob | null = null;
    for (const job of this.jobs.values()) latest = job;
    return latest;
  }

  stats(): IndexStats {
    return {
      built: this.snapshot !== null,
      chunkCount: this.snapshot?.chunks.length ?? 0,
      pageCount: this.snapshot ? this.pageCount : 0,
      cachedQueries: this.queryCache.size,
      builtAt: this.snapshot?.builtAt ?? null,
    };
  }

  /**
   * Hybrid search followed by reranking. Waits for an in-flight build first,
   * then fails with IndexNotBuiltError if there is still nothing to search.
   */
  async search(query: string, options?: SearchOptions): Promise<SearchResult[]> {
    while (this.pendingBuild) {
      await this.pendingBuild;
    }

    const snapshot = this.snapshot;
    if (!snapshot) {
      throw new IndexNotBuiltError();
    }

    const topK = clamp(Math.floor(options?.topK ?? this.defaults.topK), 1, 100);
    const weight = clamp(options?.weight ?? this.defaults.weight, 0, 1);
    const minScore = options?.minScore ?? this.defaults.minScore;

    const keywordOnly = snapshot.degraded?.includes("embedding") ?? false;
    const queryVector = keywordOnly ? null : await this.queryVector(query);
    const candidates = scoreHybrid(query, queryVector, snapshot, {
      limit: topK * this.overFetch,
      weight,
      minScore,
    });

    console.log(`[search] "${query}": ${candidates.length} candidates before reranking`);

    const results = await this.reranker.rerank(query, candidates, topK);

    console.log(`[search] "${query}": ${results.length} results after reranking (${this.reranker.providerName})`);

    return results;
  }

  /** Reload a persisted {chunks, urls} document */
  static async readPersisted(path: string): Promise<PersistedIndex> {
    const raw = await readFile(path, "utf-8");
    return PersistedIndexSchema.parse(JSON.parse(raw));
  }

  private async queryVector(query: string): Promise<number[] | null> {
    const cached = this.queryCache.get(query);
    if (cached) return cached;

    try {
      const vector = await this.embeddingProvider.embedSingle(query);
      // unbounded: query volume is expected to stay small
      this.queryCache.set(query, vector);
      return vector;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[search] Query embedding failed, falling back to keyword scores: ${message}`);
      return null;
    }
  }

  private async runBuild(job: BuildJob, pages: Page[], generation: number): Promise<IndexBuildOutcome> {
    let chunkCount = 0;
    const outcome = (
      status: IndexBuildOutcome["status"],
      extra: Partial<Pick<IndexBuildOutcome, "savedTo" | "degraded" | "error">> = {}
    ): IndexBuildOutcome => ({
      status,
      chunkCount,
      pageCount: pages.length,
      savedTo: extra.savedTo ?? null,
      ...(extra.degraded ? { degraded: extra.degraded } : {}),
      ...(extra.error !== undefined ? { error: extra.error } : {}),
    });

    try {
      // yield once so the caller receives the job before any work happens
      await Promise.resolve();

      const pieces = chunkPages(pages, this.chunker);
      const chunks = pieces.map(piece => piece.text);
      const urls = pieces.map(piece => piece.sourceUrl);
      chunkCount = chunks.length;

      if (job.cancelled) {
        return outcome("cancelled", { error: new BuildCancelledError(job.id).message });
      }

      if (chunks.length === 0) {
        if (generation === this.generation) {
          this.snapshot = null;
          this.pageCount = 0;
        }
        console.warn("[index] No valid text found, index left unbuilt");
        return outcome("empty");
      }

      console.log(`[index] Embedding ${chunks.length} chunks from ${pages.length} pages (${this.embeddingProvider.name})`);
      const embeddings = await this.embedChunks(chunks);
      const degraded: DegradedStage[] = embeddings ? [] : ["embedding"];

      if (job.cancelled) {
        return outcome("cancelled", { error: new BuildCancelledError(job.id).message });
      }
      if (generation !== this.generation) {
        return outcome("cancelled", { error: "superseded by a newer build" });
      }

      this.snapshot = { chunks, urls, embeddings: embeddings ?? [], builtAt: Date.now(), degraded };
      this.pageCount = pages.length;
      console.log(`[index] Indexed ${chunks.length} chunks from ${pages.length} pages`);

      const savedTo = await this.persist(chunks, urls);
      return outcome("completed", { savedTo, ...(degraded.length > 0 ? { degraded } : {}) });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[index] Build ${job.id} failed: ${message}`);
      return outcome("failed", { error: message });
    }
  }

  /** Embeddings for every chunk, or null when the provider cannot deliver them */
  private async embedChunks(chunks: string[]): Promise<number[][] | null> {
    try {
      const embeddings = await this.embeddingProvider.embed(chunks);
      if (embeddings.length !== chunks.length) {
        throw new Error(`${this.embeddingProvider.name} returned ${embeddings.length} vectors for ${chunks.length} chunks`);
      }
      return embeddings;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[index] Embedding failed, indexing for keyword scores only: ${message}`);
      return null;
    }
  }

  private async persist(chunks: string[], urls: string[]): Promise<string | null> {
    if (!this.persistPath) return null;

    const document: PersistedIndex = { chunks, urls };
    try {
      await mkdir(dirname(this.persistPath), { recursive: true });
      await writeFile(this.persistPath, JSON.stringify(document, null, 2), "utf-8");
      return this.persistPath;
    } catch (error) {
      console.error(`[index] Failed to persist index to ${this.persistPath}:`, error);
      return null;
    }
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
