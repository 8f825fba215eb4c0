/**
 * Follow-up measurement recommendation for tier C hypotheses.
 *
 * The most informative next measurement is the expected-but-unmatched line
 * whose nearest observed feature explains it worst. It is searched in the
 * hypothesis and its strongest rival (for the leader: the top two).
 * Ties go to the better-ranked candidate, then canonical modality order,
 * then the lower expected center. Without any unmatched line, the
 * hypothesis' unobserved or lowest-scoring modality is recommended instead.
 */

import type { Modality } from "../config/rubric/enums.js";
import { compareModalities } from "../config/rubric/enums.js";
import type { ModalityScore } from "../scoring/schema.js";
import type { Followup } from "./schema.js";

export interface FollowupCandidate {
  candidateId: string;
  rank: number;
  scores: readonly ModalityScore[];
}

interface LineOption {
  candidateId: string;
  rank: number;
  modality: Modality;
  templateSourceId: string;
  expectedCenter: number;
  label?: string;
  nearestLikelihood: number;
}

function compareOptions(a: LineOption, b: LineOption): number {
  if (a.nearestLikelihood !== b.nearestLikelihood) return a.nearestLikelihood - b.nearestLikelihood;
  if (a.rank !== b.rank) return a.rank - b.rank;
  const byModality = compareModalities(a.modality, b.modality);
  if (byModality !== 0) return byModality;
  return a.expectedCenter - b.expectedCenter;
}

/**
 * @param subject - The hypothesis needing a follow-up
 * @param rival - Its strongest rival, if any
 * @param configuredModalities - Modalities the rubric scores, canonical order
 */
export function recommendFollowup(
  subject: FollowupCandidate,
  rival: FollowupCandidate | undefined,
  configuredModalities: readonly Modality[]
): Followup | undefined {
  const options: LineOption[] = [];
  for (const candidate of rival ? [subject, rival] : [subject]) {
    for (const score of candidate.scores) {
      if (score.mode !== "sparse") continue;
      for (const line of score.unmatched) {
        options.push({
          candidateId: candidate.candidateId,
          rank: candidate.rank,
          modality: score.modality,
          templateSourceId: score.templateSourceId,
          expectedCenter: line.expectedCenter,
          ...(line.label !== undefined ? { label: line.label } : {}),
          nearestLikelihood: line.nearestLikelihood,
        });
      }
    }
  }

  const best = options.sort(compareOptions)[0];
  if (best) {
    const what = best.label !== undefined ? `${best.label} at ${best.expectedCenter}` : `line at ${best.expectedCenter}`;
    return {
      kind: "expected_feature",
      candidateId: best.candidateId,
      modality: best.modality,
      templateSourceId: best.templateSourceId,
      expectedCenter: best.expectedCenter,
      ...(best.label !== undefined ? { label: best.label } : {}),
      nearestLikelihood: best.nearestLikelihood,
      rationale: `Re-measure ${best.modality} around the expected ${what} of "${best.candidateId}" (nearest-feature likelihood ${best.nearestLikelihood.toFixed(3)})`,
    };
  }

  const scored = [...subject.scores].sort((a, b) => compareModalities(a.modality, b.modality));
  const scoredModalities = new Set(scored.map((s) => s.modality));

  const unobserved =
    scored.find((s) => s.status === "no_observations")?.modality ??
    configuredModalities.find((m) => !scoredModalities.has(m));
  if (unobserved !== undefined) {
    return {
      kind: "acquire_modality",
      candidateId: subject.candidateId,
      modality: unobserved,
      rationale: `Acquire ${unobserved} data for "${subject.candidateId}"; it has no usable observations yet`,
    };
  }

  const weakest = scored.reduce<ModalityScore | undefined>(
    (lowest, s) => (lowest === undefined || s.score < lowest.score ? s : lowest),
    undefined
  );
  if (weakest === undefined) return undefined;
  return {
    kind: "acquire_modality",
    candidateId: subject.candidateId,
    modality: weakest.modality,
    rationale: `Repeat the ${weakest.modality} measurement for "${subject.candidateId}"; it is the weakest modality (S ${weakest.score.toFixed(3)})`,
  };
}
