// HTTP page fetcher bounded by a concurrency gate and a fixed timeout

import type { Fetcher } from "../types";
import { Semaphore } from "./semaphore";

export const USER_AGENTS = [
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36",
  "Mozilla/5.0 (X11; Linux x86_64) Gecko/20100101 Firefox/115.0",
  "Mozilla/5.0 (iPhone; CPU iPhone OS 17_1 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Mobile/15E148 Safari/604.1",
] as const;

export interface HttpFetcherOptions {
  concurrency?: number;
  timeout?: number;
  acceptLanguage?: string;
  userAgents?: readonly string[];
  /** Shared gate, for callers that want several fetchers to draw on one budget */
  gate?: Semaphore;
  random?: () => number;
}

export class HttpFetcher implements Fetcher {
  private gate: Semaphore;
  private timeout: number;
  private acceptLanguage: string;
  private userAgents: readonly string[];
  private random: () => number;

  constructor(options?: HttpFetcherOptions) {
    this.gate = options?.gate ?? new Semaphore(options?.concurrency ?? 5);
    this.timeout = options?.timeout ?? 10000;
    this.acceptLanguage = options?.acceptLanguage ?? "en-US,en;q=0.9";
    this.userAgents = options?.userAgents ?? USER_AGENTS;
    this.random = options?.random ?? Math.random;
  }

  /**
   * Fetch one HTML page. Timeouts, error statuses, non-HTML bodies and
   * transport errors all resolve to null; nothing is retried.
   */
  async fetch(url: string): Promise<string | null> {
    return this.gate.run(() => this.fetchHtml(url));
  }

  pickUserAgent(): string {
    const index = Math.floor(this.random() * this.userAgents.length);
    return this.userAgents[Math.min(index, this.userAgents.length - 1)] ?? USER_AGENTS[0];
  }

  private async fetchHtml(url: string): Promise<string | null> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        headers: {
          "User-Agent": this.pickUserAgent(),
          "Accept-Language": this.acceptLanguage,
        },
        signal: controller.signal,
        redirect: "follow",
      });

      if (!response.ok) {
        console.warn(`[fetch] Skipping ${url}: HTTP ${response.status}`);
        return null;
      }

      const contentType = response.headers.get("Content-Type") ?? "";
      if (!contentType.toLowerCase().includes("text/html")) {
        console.warn(`[fetch] Skipping ${url}: content type ${contentType || "(none)"}`);
        return null;
      }

      return await response.text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[fetch] Failed to fetch ${url}: ${message}`);
      return null;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
