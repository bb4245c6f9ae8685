// Sentence-aligned chunker - greedily packs sentences into bounded-length chunks

import type { Chunk, Chunker, Page } from "../types";

const MIN_TEXT_LENGTH = 50;

export class SentenceChunker implements Chunker {
  constructor(private readonly defaultMaxLength = 300) {}

  chunk(text: string, maxLength = this.defaultMaxLength): string[] {
    const normalized = text.replace(/\s+/g, " ").trim();
    if (normalized.length < MIN_TEXT_LENGTH) {
      return [];
    }

    const sentences = normalized.split(/(?<=[.!?]) +/).filter(Boolean);
    const chunks: string[] = [];
    let current = "";

    for (const sentence of sentences) {
      const candidate = current ? `${current} ${sentence}` : sentence;
      if (candidate.length <= maxLength) {
        current = candidate;
        continue;
      }
      // a single sentence longer than maxLength becomes its own chunk
      if (current) chunks.push(current);
      current = sentence;
    }

    if (current) chunks.push(current);

    return chunks;
  }
}

/** Chunk every page, tagging each piece with the page it came from */
export function chunkPages(pages: readonly Page[], chunker: Chunker): Chunk[] {
  const chunks: Chunk[] = [];
  for (const page of pages) {
    const content = page.content.trim();
    if (!content) continue;
    for (const text of chunker.chunk(content)) {
      chunks.push({ text, sourceUrl: page.url || "unknown" });
    }
  }
  return chunks;
}
