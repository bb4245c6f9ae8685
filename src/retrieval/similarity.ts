// Vector similarity helpers

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  a.forEach((value, i) => {
    const other = b[i] ?? 0;
    dotProduct += value * other;
    normA += value * value;
    normB += other * other;
  });

  normA = Math.sqrt(normA);
  normB = Math.sqrt(normB);

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (normA * normB);
}

/** Cosine similarity of one vector against each of many */
export function similarity(query: number[], vectors: number[][]): number[] {
  return vectors.map(vector => cosineSimilarity(query, vector));
}
