#!/usr/bin/env tsx
// siteseek - policy-aware site crawler with hybrid retrieval

import { pathToFileURL } from "url";
import type { SearchResult } from "./types";

// Re-export all types
export * from "./types";

// Config
export {
  loadConfig,
  saveConfig,
  getDataPaths,
  validateConfig,
  ConfigValidationError,
  DEFAULT_CONFIG,
} from "./config";

// Crawler
export * from "./crawler";

// Retrieval
export * from "./retrieval";

// Embedding
export * from "./embedding";

// Rerank
export * from "./rerank";

// Summarizer
export * from "./summarizer";

// Worker
export * from "./worker";

function printResults(results: SearchResult[]): void {
  for (const result of results) {
    console.log(`\n--- ${result.url} ---`);
    const rerank = result.rerankScore === null ? "n/a" : result.rerankScore.toFixed(3);
    console.log(`Score: ${(result.finalScore * 100).toFixed(1)}% (rerank ${rerank})`);
    if (result.degraded.length > 0) console.log(`Degraded: ${result.degraded.join(", ")}`);
    console.log("");
    console.log(result.content.slice(0, 500) + (result.content.length > 500 ? "..." : ""));
  }
}

// CLI entry point
export async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  const command = args[0];

  switch (command) {
    case "worker":
    case "serve": {
      const { startWorkerServer } = await import("./worker");
      await startWorkerServer();
      break;
    }

    case "crawl": {
      const url = args[1];
      if (!url) {
        console.error("Usage: siteseek crawl <url> [query]");
        process.exit(1);
      }
      const query = args.slice(2).join(" ");

      const { getOrchestrator } = await import("./crawler");
      const orchestrator = await getOrchestrator();

      console.log(`Crawling ${url}${query ? ` for "${query}"` : ""}...`);
      const crawled = await orchestrator.crawlSites([url], query);

      console.log(`\nPages: ${crawled.pages.length}`);
      console.log(`Blocked by robots.txt: ${crawled.blocked.length}`);
      console.log(`Failed: ${crawled.failed.length}`);
      for (const page of crawled.pages) {
        console.log(`  ${page.url} (${page.content.length} chars)`);
      }
      break;
    }

    case "search": {
      const url = args[1];
      const query = args.slice(2).join(" ");
      if (!url || !query) {
        console.error("Usage: siteseek search <url> <query>");
        process.exit(1);
      }

      const { getOrchestrator } = await import("./crawler");
      const orchestrator = await getOrchestrator();
      const response = await orchestrator.search({ query, url, smart: true });

      if (response.results.length === 0) {
        console.log(response.summary ?? "No results found.");
      } else {
        if (response.summary) {
          console.log(`Summary: ${response.summary}`);
        }
        printResults(response.results);
      }
      if (response.blocked.length > 0) {
        console.log(`\n${response.blocked.length} URLs blocked by robots.txt`);
      }
      break;
    }

    default:
      console.log("siteseek - Policy-aware site crawler with hybrid search");
      console.log("");
      console.log("Usage: siteseek <command> [options]");
      console.log("");
      console.log("Commands:");
      console.log("  serve                   Start the worker HTTP service");
      console.log("  crawl <url> [query]     Crawl a site and list the collected pages");
      console.log("  search <url> <query>    Crawl a site, index it and search it");
      console.log("");
      console.log("Examples:");
      console.log("  siteseek serve");
      console.log("  siteseek crawl https://www.python.org/");
      console.log("  siteseek search https://www.python.org/ \"release schedule\"");
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch(error => {
    console.error(error);
    process.exit(1);
  });
}
