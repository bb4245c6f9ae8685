// Query-aware extractive summarizer

import type { Summarizer } from "../types";
import { queryTerms } from "../crawler/relevance";

export const EMPTY_SUMMARY = "No relevant content found.";

const MIN_SENTENCE_LENGTH = 25;

export interface ExtractiveSummarizerOptions {
  maxSentences?: number;
}

export class ExtractiveSummarizer implements Summarizer {
  private maxSentences: number;

  constructor(options?: ExtractiveSummarizerOptions) {
    this.maxSentences = options?.maxSentences ?? 5;
  }

  async summarize(text: string, query?: string): Promise<string> {
    const cleaned = cleanText(text);
    if (!cleaned) return EMPTY_SUMMARY;

    const sentences = dedupeSentences(splitSentences(cleaned));
    if (sentences.length === 0) return EMPTY_SUMMARY;

    const terms = queryTerms(query ?? "");
    const relevant = terms.length > 0
      ? sentences.filter(sentence => {
          const lower = sentence.toLowerCase();
          return terms.some(term => lower.includes(term));
        })
      : [];

    const chosen = relevant.length > 0 ? relevant : sentences;
    return chosen.slice(0, this.maxSentences).join(" ");
  }
}

/** Collapse whitespace and drop bracketed citation markers like [12] */
export function cleanText(text: string): string {
  return text
    .replace(/\[[0-9]+\]/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function splitSentences(text: string): string[] {
  return text.split(/(?<=[.!?])\s+/).map(s => s.trim()).filter(Boolean);
}

function dedupeSentences(sentences: string[]): string[] {
  const seen = new Set<string>();
  const kept: string[] = [];

  for (const sentence of sentences) {
    const key = sentence.toLowerCase();
    if (key.length <= MIN_SENTENCE_LENGTH || seen.has(key)) continue;
    seen.add(key);
    kept.push(sentence);
  }

  return kept;
}
