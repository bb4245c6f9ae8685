// Page content extractor using linkedom - readable text and in-domain links

import { parseHTML } from "linkedom";
import type { Extractor } from "../types";

type ParsedDocument = ReturnType<typeof parseHTML>["document"];

const NON_CONTENT_SELECTOR = [
  "script",
  "style",
  "noscript",
  "template",
  "nav",
  "footer",
  "header",
  "aside",
  "form",
  "iframe",
  "svg",
  "[role=navigation]",
  "[role=banner]",
  "[role=contentinfo]",
  "[aria-hidden=true]",
].join(", ");

const PRIMARY_REGION_SELECTORS = ["main", "article", "[role=main]", "body"];

const CONTENT_SELECTOR = "h1, h2, h3, p, li, div, span";

export interface ContentExtractorOptions {
  /** Elements need strictly more words than this to be kept */
  minWords?: number;
}

export class ContentExtractor implements Extractor {
  private minWords: number;

  constructor(options?: ContentExtractorOptions) {
    this.minWords = options?.minWords ?? 5;
  }

  extract(html: string): string {
    const document = this.parse(html);

    for (const element of Array.from(document.querySelectorAll(NON_CONTENT_SELECTOR))) {
      element.remove();
    }

    const region = this.findPrimaryRegion(document);
    if (!region) return "";

    const parts: string[] = [];
    const emitted = new Set<unknown>();

    for (const element of Array.from(region.querySelectorAll(CONTENT_SELECTOR))) {
      if (this.hasEmittedAncestor(element, emitted)) continue;

      const text = normalizeWhitespace(element.textContent ?? "");
      if (countWords(text) <= this.minWords) continue;
      if (text.startsWith("©")) continue;

      parts.push(text);
      emitted.add(element);
    }

    return parts.join(" ");
  }

  links(html: string, baseUrl: string, domain: string): Set<string> {
    const document = this.parse(html);
    const links = new Set<string>();
    const targetDomain = domain.toLowerCase();

    for (const anchor of Array.from(document.querySelectorAll("a[href]"))) {
      const href = anchor.getAttribute("href");
      if (!href) continue;

      let absoluteUrl: URL;
      try {
        absoluteUrl = new URL(href, baseUrl);
      } catch {
        continue;
      }

      if (absoluteUrl.protocol !== "http:" && absoluteUrl.protocol !== "https:") continue;
      if (!isWithinDomain(absoluteUrl.hostname, targetDomain)) continue;

      absoluteUrl.hash = "";
      links.add(absoluteUrl.toString());
    }

    return links;
  }

  private parse(html: string): ParsedDocument {
    // linkedom leaves body null for bare fragments
    const source = /<html[\s>]/i.test(html)
      ? html
      : `<!DOCTYPE html><html><head></head><body>${html}</body></html>`;
    return parseHTML(source).document;
  }

  private findPrimaryRegion(document: ParsedDocument) {
    for (const selector of PRIMARY_REGION_SELECTORS) {
      const region = document.querySelector(selector);
      if (region) return region;
    }
    return document.documentElement;
  }

  private hasEmittedAncestor(element: { parentElement: unknown }, emitted: Set<unknown>): boolean {
    let current = element.parentElement;
    while (isElementLike(current)) {
      if (emitted.has(current)) return true;
      current = current.parentElement;
    }
    return false;
  }
}

function isElementLike(value: unknown): value is { parentElement: unknown } {
  return typeof value === "object" && value !== null && "parentElement" in value;
}

export function isWithinDomain(hostname: string, domain: string): boolean {
  const host = hostname.toLowerCase();
  return host === domain || host.endsWith(`.${domain}`);
}

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function countWords(text: string): number {
  return text ? text.split(" ").length : 0;
}
