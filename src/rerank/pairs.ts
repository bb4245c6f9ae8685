// Rerank APIs take one query with many documents; pairs are grouped by query

export interface QueryGroup {
  query: string;
  documents: string[];
  /** Index of each document in the original pair list */
  positions: number[];
}

export function groupByQuery(pairs: Array<[query: string, text: string]>): QueryGroup[] {
  const groups = new Map<string, QueryGroup>();

  pairs.forEach(([query, text], position) => {
    let group = groups.get(query);
    if (!group) {
      group = { query, documents: [], positions: [] };
      groups.set(query, group);
    }
    group.documents.push(text);
    group.positions.push(position);
  });

  return Array.from(groups.values());
}
