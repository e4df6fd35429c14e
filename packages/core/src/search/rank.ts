import type { IndexedFile } from "../storage/index/types.js";

export interface MatchResult {
  file: IndexedFile;
  /** Normalized form of file.name that was scored. */
  normalizedName: string;
  /** Similarity in [0, 1]. */
  score: number;
}

/** Score descending, then normalized name, then path (code-unit order). */
export function compareMatches(a: MatchResult, b: MatchResult): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.normalizedName !== b.normalizedName) {
    return a.normalizedName < b.normalizedName ? -1 : 1;
  }
  if (a.file.path !== b.file.path) {
    return a.file.path < b.file.path ? -1 : 1;
  }
  return 0;
}

/** Merges lists that are each already sorted by compareMatches. */
export function mergeRanked(lists: readonly MatchResult[][]): MatchResult[] {
  const heads = lists.map(() => 0);
  const total = lists.reduce((sum, list) => sum + list.length, 0);
  const merged: MatchResult[] = [];

  while (merged.length < total) {
    let pick = -1;
    for (let i = 0; i < lists.length; i++) {
      if (heads[i] >= lists[i].length) continue;
      if (
        pick === -1 ||
        compareMatches(lists[i][heads[i]], lists[pick][heads[pick]]) < 0
      ) {
        pick = i;
      }
    }
    merged.push(lists[pick][heads[pick]]);
    heads[pick]++;
  }
  return merged;
}
