// Site crawler - bounded breadth-first traversal within one domain

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import type {
  CrawlerConfig,
  CrawlOptions,
  CrawlResult,
  CrawlTask,
  Extractor,
  Fetcher,
  Page,
  PolicyGate,
} from "../types";
import { HttpFetcher } from "./fetcher";
import { ContentExtractor } from "./extractor";
import { RobotsPolicyGate } from "./policy";
import { countQueryHits, rankTextByQuery } from "./relevance";

export interface SiteCrawlerDeps {
  policy: PolicyGate;
  fetcher: Fetcher;
  extractor: Extractor;
}

export interface SiteCrawlerOptions {
  maxPages?: number;
  maxDepth?: number;
  /** Pause after every page that was collected (ms) */
  politeDelay?: number;
  /** Distinct query terms needed in one page to stop crawling */
  earlyExitHits?: number;
  /** Base of the reference page tried when nothing was collected; null disables */
  fallbackBaseUrl?: string | null;
  /** Directory for crawl artifacts; null disables persistence */
  outputDir?: string | null;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class SiteCrawler {
  private policy: PolicyGate;
  private fetcher: Fetcher;
  private extractor: Extractor;
  private maxPages: number;
  private maxDepth: number;
  private politeDelay: number;
  private earlyExitHits: number;
  private fallbackBaseUrl: string | null;
  private outputDir: string | null;
  private now: () => number;
  private sleep: (ms: number) => Promise<void>;

  constructor(deps: SiteCrawlerDeps, options?: SiteCrawlerOptions) {
    this.policy = deps.policy;
    this.fetcher = deps.fetcher;
    this.extractor = deps.extractor;
    this.maxPages = options?.maxPages ?? 50;
    this.maxDepth = options?.maxDepth ?? 2;
    this.politeDelay = options?.politeDelay ?? 200;
    this.earlyExitHits = options?.earlyExitHits ?? 2;
    this.fallbackBaseUrl = options?.fallbackBaseUrl === undefined
      ? "https://en.wikipedia.org/wiki/"
      : options.fallbackBaseUrl;
    this.outputDir = options?.outputDir ?? null;
    this.now = options?.now ?? Date.now;
    this.sleep = options?.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
  }

  async crawl(seedUrl: string, options?: CrawlOptions): Promise<CrawlResult> {
    const seed = parseSeed(seedUrl);
    const domain = seed.hostname.toLowerCase();
    const maxPages = options?.maxPages ?? this.maxPages;
    const maxDepth = options?.maxDepth ?? this.maxDepth;
    const query = options?.query ?? "";

    const queue: CrawlTask[] = [{ url: seed.toString(), depth: 0 }];
    const queued = new Set<string>([seed.toString()]);
    const visited = new Set<string>();
    const blocked = new Set<string>();
    const failed: string[] = [];
    const pages: Page[] = [];
    let stoppedEarly = false;

    console.log(`[crawl] Starting from ${seed.toString()} (domain ${domain}, maxPages ${maxPages}, maxDepth ${maxDepth})`);

    while (queue.length > 0 && pages.length < maxPages) {
      const task = queue.shift();
      if (!task) break;
      queued.delete(task.url);

      if (visited.has(task.url) || blocked.has(task.url) || task.depth > maxDepth) {
        continue;
      }

      if (!(await this.policy.allowed(task.url))) {
        blocked.add(task.url);
        continue;
      }

      const html = await this.fetcher.fetch(task.url);
      visited.add(task.url);

      const content = html ? this.toContent(html, query) : "";
      if (!html || !content) {
        failed.push(task.url);
        continue;
      }

      pages.push({ url: task.url, content });
      console.log(`[crawl] Crawled ${task.url} (${content.length} chars)`);

      if (query && countQueryHits(content, query) >= this.earlyExitHits) {
        console.log(`[crawl] Early stop at ${task.url}: enough query terms found`);
        stoppedEarly = true;
        break;
      }

      if (task.depth < maxDepth) {
        for (const link of this.extractor.links(html, task.url, domain)) {
          if (queue.length >= maxPages) break;
          if (visited.has(link) || blocked.has(link) || queued.has(link)) continue;
          queue.push({ url: link, depth: task.depth + 1 });
          queued.add(link);
        }
      }

      await this.pause();
    }

    let fallbackUrl: string | null = null;
    if (pages.length === 0 && this.fallbackBaseUrl) {
      fallbackUrl = referencePageUrl(this.fallbackBaseUrl, domain);
      console.warn(`[crawl] No crawlable content on ${domain}, trying reference page ${fallbackUrl}`);
      const page = await this.fetchFallback(fallbackUrl, query);
      if (page) pages.push(page);
    }

    const savedTo = await this.persist(domain, pages);

    console.log(`[crawl] Complete for ${domain}: ${pages.length} pages, ${blocked.size} blocked, ${failed.length} failed`);

    return {
      seedUrl: seed.toString(),
      domain,
      pages,
      blocked: Array.from(blocked),
      failed,
      visited: Array.from(visited),
      stoppedEarly,
      fallbackUrl,
      savedTo,
    };
  }

  private toContent(html: string, query: string): string {
    const text = this.extractor.extract(html);
    return text ? rankTextByQuery(text, query) : "";
  }

  private async fetchFallback(url: string, query: string): Promise<Page | null> {
    const html = await this.fetcher.fetch(url);
    if (!html) return null;
    const content = this.toContent(html, query);
    return content ? { url, content } : null;
  }

  private async persist(domain: string, pages: Page[]): Promise<string | null> {
    if (!this.outputDir) return null;

    const timestamp = Math.floor(this.now() / 1000);
    const path = join(this.outputDir, `crawled_${domain}_${timestamp}.json`);
    try {
      await mkdir(this.outputDir, { recursive: true });
      await writeFile(path, JSON.stringify(pages, null, 2), "utf-8");
      console.log(`[crawl] Saved ${pages.length} pages to ${path}`);
      return path;
    } catch (error) {
      console.error(`[crawl] Failed to save crawl output to ${path}:`, error);
      return null;
    }
  }

  private async pause(): Promise<void> {
    if (this.politeDelay <= 0) return;
    await this.sleep(this.politeDelay);
  }
}

function parseSeed(seedUrl: string): URL {
  let seed: URL;
  try {
    seed = new URL(seedUrl);
  } catch {
    throw new Error(`Invalid seed URL: ${seedUrl}`);
  }
  if (seed.protocol !== "http:" && seed.protocol !== "https:") {
    throw new Error(`Unsupported seed URL scheme: ${seed.protocol}`);
  }
  seed.hash = "";
  return seed;
}

/** "www.python.org" -> "Python" */
export function brandToken(domain: string): string {
  const label = domain.toLowerCase().replace(/^www\./, "").split(".")[0] ?? "";
  return label.charAt(0).toUpperCase() + label.slice(1);
}

export function referencePageUrl(baseUrl: string, domain: string): string {
  return `${baseUrl}${brandToken(domain)}`;
}

/**
 * Wire a crawler with the network-backed gate and fetcher. Each call gets its
 * own fetcher (and gate), so concurrent crawls share no state.
 */
export function createSiteCrawler(
  config: CrawlerConfig,
  paths: { outputDir: string | null; auditLogPath: string | null }
): SiteCrawler {
  return new SiteCrawler(
    {
      policy: new RobotsPolicyGate({
        auditLogPath: paths.auditLogPath,
        timeout: config.timeout,
        cacheByOrigin: config.cacheRobots,
      }),
      fetcher: new HttpFetcher({
        concurrency: config.concurrency,
        timeout: config.timeout,
        acceptLanguage: config.acceptLanguage,
      }),
      extractor: new ContentExtractor(),
    },
    {
      maxPages: config.maxPages,
      maxDepth: config.maxDepth,
      politeDelay: config.politeDelay,
      fallbackBaseUrl: config.fallbackBaseUrl,
      outputDir: paths.outputDir,
    }
  );
}
