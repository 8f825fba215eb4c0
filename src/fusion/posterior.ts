/**
 * Log-posterior fusion.
 *
 *   log P(M|D) = log P₀(M) + Σ_k λ_k · q_k · f(S_k(M)) − Γ(M)
 *
 * with f(S) = log((ε+S)/(ε+1−S)) and Γ(M) = γ_p · max(0, components − 1).
 * The sum runs in canonical modality order regardless of the order the
 * terms are supplied in, so the floating-point result is reproducible.
 */

import type { Modality } from "../config/rubric/enums.js";
import { compareModalities } from "../config/rubric/enums.js";
import type { Rubric } from "../config/rubric/schema.js";
import { clampUnit, logistic, normalizeZero } from "../scoring/numeric.js";
import type { ContributionBasis, ModalityContribution, Posterior } from "./schema.js";

export interface FusionTerm {
  modality: Modality;
  /** Defaults to "scored". */
  basis?: ContributionBasis;
  score: number;
  qualityWeight: number;
  fusionWeight: number;
}

export interface FusionInput {
  logPrior: number;
  priorSource: Posterior["priorSource"];
  componentCount: number;
  terms: readonly FusionTerm[];
}

/**
 * f(S) = log((ε+S)/(ε+1−S)); finite for every S ∈ [0, 1] since ε > 0.
 */
export function linkFunction(score: number, epsilon: number): number {
  const s = clampUnit(score);
  return normalizeZero(Math.log((epsilon + s) / (epsilon + 1 - s)));
}

export function parsimonyPenalty(componentCount: number, perComponent: number): number {
  return perComponent * Math.max(0, componentCount - 1);
}

/**
 * G = σ(log P).
 */
export function posteriorScore(logPosterior: number): number {
  return clampUnit(logistic(logPosterior));
}

export function fuse(
  input: FusionInput,
  rubric: Pick<Rubric, "link" | "fusion">
): Posterior {
  const ordered = [...input.terms].sort((a, b) => compareModalities(a.modality, b.modality));

  let evidence = 0;
  const contributions: ModalityContribution[] = ordered.map((term) => {
    const link = linkFunction(term.score, rubric.link.epsilon);
    const contribution = normalizeZero(term.fusionWeight * term.qualityWeight * link);
    evidence += contribution;
    return {
      modality: term.modality,
      basis: term.basis ?? "scored",
      score: term.score,
      qualityWeight: term.qualityWeight,
      fusionWeight: term.fusionWeight,
      link,
      contribution,
    };
  });

  const penalty = parsimonyPenalty(input.componentCount, rubric.fusion.parsimonyPerComponent);
  const logPosterior = normalizeZero(input.logPrior + evidence - penalty);

  return {
    logPrior: input.logPrior,
    priorSource: input.priorSource,
    evidence: normalizeZero(evidence),
    parsimonyPenalty: penalty,
    logPosterior,
    score: posteriorScore(logPosterior),
    contributions,
  };
}
