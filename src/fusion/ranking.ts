/**
 * Deterministic hypothesis ranking.
 *
 * Primary key is the raw log-posterior, descending. Keys are walked in that
 * order and split into tie groups: a group is anchored on its highest
 * log-posterior and takes every following key within the rubric's tie
 * tolerance of the anchor. Groups never overlap, so a key more than the
 * tolerance below another always ranks after it. Inside a group:
 *
 *   1. more corroborating modalities (S ≥ s_min)
 *   2. higher minimum single-modality score
 *   3. label, by UTF-16 code unit comparison
 *   4. candidate id
 *
 * A tolerance of 0 ties only identical log-posteriors.
 */

export interface RankingKey {
  candidateId: string;
  label: string;
  logPosterior: number;
  /** Scores of every modality the candidate was scored in. */
  modalityScores: readonly number[];
}

function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function corroboratingCount(scores: readonly number[], sMin: number): number {
  return scores.filter((s) => s >= sMin).length;
}

export function minimumScore(scores: readonly number[]): number {
  return scores.length === 0 ? 0 : Math.min(...scores);
}

/** Order two keys already known to be tied on log-posterior. */
export function breakTie(a: RankingKey, b: RankingKey, sMin: number): number {
  const corroborating =
    corroboratingCount(b.modalityScores, sMin) - corroboratingCount(a.modalityScores, sMin);
  if (corroborating !== 0) return corroborating;

  const weakest = minimumScore(b.modalityScores) - minimumScore(a.modalityScores);
  if (weakest !== 0) return weakest;

  return compareCodeUnits(a.label, b.label) || compareCodeUnits(a.candidateId, b.candidateId);
}

/**
 * Partition keys into tie groups, highest log-posterior first.
 */
export function tieGroups<T extends RankingKey>(keys: readonly T[], tieTolerance: number): T[][] {
  const byPosterior = [...keys].sort(
    (a, b) => b.logPosterior - a.logPosterior || compareCodeUnits(a.candidateId, b.candidateId)
  );
  const groups: T[][] = [];
  let current: T[] = [];
  for (const key of byPosterior) {
    const anchor = current[0];
    if (anchor !== undefined && anchor.logPosterior - key.logPosterior > tieTolerance) {
      groups.push(current);
      current = [];
    }
    current.push(key);
  }
  if (current.length > 0) groups.push(current);
  return groups;
}

/**
 * Sort a copy of the keys into rank order.
 */
export function rankHypotheses<T extends RankingKey>(
  keys: readonly T[],
  tieTolerance: number,
  sMin: number
): T[] {
  return tieGroups(keys, tieTolerance).flatMap((group) =>
    group.sort((a, b) => breakTie(a, b, sMin))
  );
}
