// Local embedding provider - hashed term-frequency vectors, no network

import type { EmbeddingProvider } from "../types";

export class LocalEmbeddingProvider implements EmbeddingProvider {
  readonly name = "local";
  readonly dimensions: number;

  constructor(dimensions = 384) {
    this.dimensions = dimensions;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.vectorize(text));
  }

  async embedSingle(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  private vectorize(text: string): number[] {
    const tokens = tokenize(text);
    const vector = new Array<number>(this.dimensions).fill(0);
    if (tokens.length === 0) return vector;

    const counts = new Map<string, number>();
    for (const token of tokens) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }

    for (const [token, count] of counts) {
      const hash = fnv1a(token);
      const idx = hash % this.dimensions;
      // the top bit picks the sign so collisions tend to cancel out
      const sign = hash & 0x80000000 ? -1 : 1;
      vector[idx] = (vector[idx] ?? 0) + sign * (count / tokens.length);
    }

    return normalize(vector);
  }
}

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\w\s]/g, " ")
    .split(/\s+/)
    .filter(t => t.length > 2);
}

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

function normalize(vector: number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (magnitude === 0) return vector;
  return vector.map(v => v / magnitude);
}
