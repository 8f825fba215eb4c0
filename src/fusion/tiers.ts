/**
 * Confidence tiers.
 *
 * A pure function of the hypothesis' G, its gap to the best other
 * hypothesis, its per-modality scores and its matched counts. Nothing else
 * is consulted, so the same numbers always yield the same tier.
 *
 *   A  G ≥ θ_A, Δ ≥ δ_A and at least two modalities with S ≥ s_min
 *      (single observed modality: S ≥ s_min and matched ≥ the diagnostic
 *      count instead of the two-modality requirement)
 *   B  G ≥ θ_B and (Δ ≥ δ_B, or one S ≥ s_strong with no other observed
 *      modality below s_min/2)
 *   C  otherwise
 */

import type { Modality } from "../config/rubric/enums.js";
import type { TierThresholds } from "../config/rubric/schema.js";
import type { SingleModalityException, TierAssessment } from "./schema.js";
import { normalizeZero } from "../scoring/numeric.js";

export interface TierModalityInput {
  modality: Modality;
  score: number;
  /** Matched expected features; 0 for dense modalities. */
  matched: number;
  /** False when the modality had no usable observations. */
  observed: boolean;
}

export interface TierInput {
  score: number;
  /** G of the best other hypothesis; undefined when there is none. */
  rivalScore?: number;
  modalities: readonly TierModalityInput[];
}

function fmt(value: number): string {
  return value.toFixed(3);
}

export function assignTier(input: TierInput, thresholds: Readonly<TierThresholds>): TierAssessment {
  const g = input.score;
  const delta = normalizeZero(g - (input.rivalScore ?? 0));
  const rationale: string[] = [];

  const corroborating = input.modalities
    .filter((m) => m.score >= thresholds.sMin)
    .map((m) => m.modality);
  const observed = input.modalities.filter((m) => m.observed);

  const single = observed.length === 1 ? observed[0] : undefined;
  const singleModality: SingleModalityException = single
    ? {
        applied: true,
        modality: single.modality,
        matched: single.matched,
        required: thresholds.singleModalityMinMatches,
        satisfied:
          single.score >= thresholds.sMin && single.matched >= thresholds.singleModalityMinMatches,
      }
    : {
        applied: false,
        modality: null,
        matched: 0,
        required: thresholds.singleModalityMinMatches,
        satisfied: false,
      };

  const gateA = g >= thresholds.thetaA && delta >= thresholds.deltaA;
  const corroborationA = singleModality.applied
    ? singleModality.satisfied
    : corroborating.length >= 2;

  if (gateA && corroborationA) {
    rationale.push(`G ${fmt(g)} ≥ θ_A ${fmt(thresholds.thetaA)} and Δ ${fmt(delta)} ≥ δ_A ${fmt(thresholds.deltaA)}`);
    rationale.push(
      singleModality.applied
        ? `single observed modality ${single?.modality ?? ""} with ${singleModality.matched} ≥ ${singleModality.required} matched features`
        : `${corroborating.length} modalities with S ≥ s_min ${fmt(thresholds.sMin)}: ${corroborating.join(", ")}`
    );
    return { tier: "A", delta, corroboratingModalities: corroborating, rationale, singleModality };
  }

  if (gateA) {
    rationale.push(
      singleModality.applied
        ? `tier A withheld: single observed modality ${single?.modality ?? ""} has ${singleModality.matched} of ${singleModality.required} required matched features (S ${fmt(single?.score ?? 0)})`
        : `tier A withheld: ${corroborating.length} modality with S ≥ s_min ${fmt(thresholds.sMin)}, 2 required`
    );
  }

  if (g >= thresholds.thetaB) {
    if (delta >= thresholds.deltaB) {
      rationale.push(`G ${fmt(g)} ≥ θ_B ${fmt(thresholds.thetaB)} and Δ ${fmt(delta)} ≥ δ_B ${fmt(thresholds.deltaB)}`);
      return { tier: "B", delta, corroboratingModalities: corroborating, rationale, singleModality };
    }
    const strong = observed.find(
      (m) =>
        m.score >= thresholds.sStrong &&
        observed.every((other) => other === m || other.score >= thresholds.sMin / 2)
    );
    if (strong) {
      rationale.push(
        `G ${fmt(g)} ≥ θ_B ${fmt(thresholds.thetaB)} and ${strong.modality} S ${fmt(strong.score)} ≥ s_strong ${fmt(thresholds.sStrong)} without contradiction`
      );
      return { tier: "B", delta, corroboratingModalities: corroborating, rationale, singleModality };
    }
    rationale.push(`Δ ${fmt(delta)} < δ_B ${fmt(thresholds.deltaB)} and no uncontradicted modality reaches s_strong`);
  } else {
    rationale.push(`G ${fmt(g)} < θ_B ${fmt(thresholds.thetaB)}`);
  }

  return { tier: "C", delta, corroboratingModalities: corroborating, rationale, singleModality };
}
