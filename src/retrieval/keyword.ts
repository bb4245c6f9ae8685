// Lexical overlap between a query and a chunk

const TOKEN_PATTERN = /\b\w{3,}\b/g;

export function keywordTokens(text: string): Set<string> {
  return new Set(text.toLowerCase().match(TOKEN_PATTERN) ?? []);
}

/**
 * |Q ∩ C| / sqrt(|Q| * |C|) over tokens of three or more word characters,
 * rounded to three decimals. 0 when either side has no tokens.
 */
export function keywordOverlap(query: string, text: string): number {
  const queryTokens = keywordTokens(query);
  const textTokens = keywordTokens(text);
  if (queryTokens.size === 0 || textTokens.size === 0) {
    return 0;
  }

  let common = 0;
  for (const token of queryTokens) {
    if (textTokens.has(token)) common++;
  }

  return Math.round((common / Math.sqrt(queryTokens.size * textTokens.size)) * 1000) / 1000;
}
