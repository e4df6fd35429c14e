/**
 * Subsequence similarity between a normalized query and a normalized
 * candidate name.
 *
 * Every query character must appear in order in the candidate. Each matched
 * character earns SCORE_MATCH plus the larger of a contiguity bonus (it
 * extends a run) or a boundary bonus (candidate start, letter/digit
 * transition). Gaps between matched characters pay an affine penalty. The raw
 * score is divided by the best score a query of that length can reach, so a
 * fully contiguous match at the start of the candidate scores exactly 1.
 */

export const SCORE_MATCH = 16;
export const BONUS_BOUNDARY = 8;
export const BONUS_TRANSITION = 4;
export const BONUS_CONSECUTIVE = 8;
export const PENALTY_GAP_START = 3;
export const PENALTY_GAP_EXTENSION = 1;

const MAX_CHAR_SCORE =
  SCORE_MATCH + Math.max(BONUS_BOUNDARY, BONUS_TRANSITION, BONUS_CONSECUTIVE);

const NO_MATCH = Number.NEGATIVE_INFINITY;

type CharClass = "letter" | "digit" | "other";

function classify(text: string, index: number): CharClass {
  const ch = text.charAt(index);
  if (ch >= "0" && ch <= "9") return "digit";
  if (ch.toLowerCase() !== ch.toUpperCase()) return "letter";
  return "other";
}

function boundaryBonuses(candidate: string): Float64Array {
  const bonuses = new Float64Array(candidate.length);
  for (let j = 0; j < candidate.length; j++) {
    if (j === 0) {
      bonuses[j] = BONUS_BOUNDARY;
    } else if (classify(candidate, j - 1) !== classify(candidate, j)) {
      bonuses[j] = BONUS_TRANSITION;
    }
  }
  return bonuses;
}

/** Best raw alignment score, or -Infinity when the query is not a subsequence. */
function alignmentScore(query: string, candidate: string): number {
  const n = query.length;
  const m = candidate.length;
  if (n === 0 || m < n) return NO_MATCH;

  const bonuses = boundaryBonuses(candidate);

  // prev[j]: best score for query[0..i-1] with query[i-1] matched at candidate[j]
  let prev = new Float64Array(m).fill(NO_MATCH);
  const first = query.charCodeAt(0);
  for (let j = 0; j < m; j++) {
    if (candidate.charCodeAt(j) === first) {
      prev[j] = SCORE_MATCH + bonuses[j];
    }
  }

  for (let i = 1; i < n; i++) {
    const cur = new Float64Array(m).fill(NO_MATCH);
    const code = query.charCodeAt(i);
    // Best prev[k] minus the penalty for the gap k+1..j-1, over k <= j-2
    let gapped = NO_MATCH;

    for (let j = i; j < m; j++) {
      if (j >= 2) {
        gapped = Math.max(
          gapped - PENALTY_GAP_EXTENSION,
          prev[j - 2] - PENALTY_GAP_START,
        );
      }
      if (candidate.charCodeAt(j) !== code) continue;

      const bonus = bonuses[j];
      const best = Math.max(
        prev[j - 1] + Math.max(BONUS_CONSECUTIVE, bonus),
        gapped + bonus,
      );
      if (best !== NO_MATCH) {
        cur[j] = SCORE_MATCH + best;
      }
    }
    prev = cur;
  }

  let best = NO_MATCH;
  for (let j = n - 1; j < m; j++) {
    if (prev[j] > best) best = prev[j];
  }
  return best;
}

/** Best alignment inside a window starting on a query-first-character hit. */
function windowScore(query: string, candidate: string): number {
  const n = query.length;
  const span = n + Math.max(1, Math.floor(n / 4));
  const first = query.charCodeAt(0);

  let best = NO_MATCH;
  for (let start = 0; start + n <= candidate.length; start++) {
    if (candidate.charCodeAt(start) !== first) continue;
    const score = alignmentScore(query, candidate.slice(start, start + span));
    if (score > best) best = score;
  }
  return best;
}

function normalize(raw: number, queryLength: number): number {
  if (raw === NO_MATCH || raw <= 0) return 0;
  return Math.min(1, raw / (MAX_CHAR_SCORE * queryLength));
}

/** Whole-candidate subsequence score in [0, 1]. */
export function subsequenceScore(query: string, candidate: string): number {
  return normalize(alignmentScore(query, candidate), query.length);
}

/** Best contiguous-substring score in [0, 1]; the window start counts as a boundary. */
export function windowedScore(query: string, candidate: string): number {
  if (query.length === 0) return 0;
  return normalize(windowScore(query, candidate), query.length);
}

/** Maximum of the whole-candidate and windowed strategies. */
export function similarity(query: string, candidate: string): number {
  if (query.length === 0) return 0;
  return Math.max(
    subsequenceScore(query, candidate),
    windowedScore(query, candidate),
  );
}
