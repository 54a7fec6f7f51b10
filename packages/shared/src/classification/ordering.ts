/**
 * Deterministic ordering helpers.
 *
 * Names compare by UTF-16 code units, never by locale, so tie-breaks and
 * report ordering are identical on every machine.
 */

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export interface RankedScore {
  category: string;
  score: number;
}

export interface Ranking {
  /** Winner after tie-break, or null when there are no candidates */
  winner: RankedScore | null;
  runnerUp: RankedScore | null;
  /** Highest score among all candidates; the winner may sit up to epsilon below it */
  topScore: number;
  /** winner.score − runnerUp.score, never negative; winner.score when alone */
  margin: number;
  /** Every category within epsilon of the best score, sorted; empty when there is no tie */
  tieCandidates: string[];
}

/**
 * Rank scores and apply the tie-break: among categories within epsilon of
 * the best score, the lexicographically smallest name wins.
 */
export function rankScores(scores: readonly RankedScore[], epsilon: number): Ranking {
  if (scores.length === 0) {
    return { winner: null, runnerUp: null, topScore: 0, margin: 0, tieCandidates: [] };
  }

  const sorted = [...scores].sort((a, b) => b.score - a.score || compareNames(a.category, b.category));
  const best = sorted[0].score;
  const tied = sorted.filter((s) => best - s.score <= epsilon).sort((a, b) => compareNames(a.category, b.category));
  const winner = tied[0];
  const runnerUp = sorted.find((s) => s.category !== winner.category) ?? null;

  return {
    winner,
    runnerUp,
    topScore: best,
    margin: runnerUp ? Math.max(0, winner.score - runnerUp.score) : winner.score,
    tieCandidates: tied.length > 1 ? tied.map((s) => s.category) : [],
  };
}
