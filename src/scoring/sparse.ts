/**
 * Sparse-mode scoring: one-to-one matching of expected lines to observed
 * features.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * MATCHING ORDER
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Every (expected line, observed feature) pair inside the match window is a
 * candidate pair. Pairs are visited in a fixed order and claimed greedily:
 *
 *   1. distance |x − μ| ascending (nearest first)
 *   2. combined sigma descending (wider, more conservative windows first)
 *   3. expected line index ascending
 *   4. feature id ascending
 *
 * The comparator is total, so the assignment does not depend on the order
 * features arrived in. All later sums run over matches sorted by feature id.
 */

import type { Numerics, SparseScoring } from "../config/rubric/schema.js";
import type { Feature, SpectrumMetadata } from "../features/schema.js";
import type { SparseTemplate } from "../templates/schema.js";
import { averageRanks, clampUnit, fwhmToSigma, normalizeZero, pearson, sum } from "./numeric.js";
import type {
  IntensityStatus,
  LineMatch,
  ModalityStatus,
  SparseComponents,
  SparseModalityScore,
  UnmatchedLine,
} from "./schema.js";

export interface SparseScoringInput {
  template: Readonly<SparseTemplate>;
  /** Usable features of the template's modality, sorted by id. */
  features: ReadonlyArray<Readonly<Feature>>;
  spectrum: (id: string) => Readonly<SpectrumMetadata> | undefined;
  rubric: Readonly<SparseScoring>;
  numerics: Readonly<Numerics>;
}

export interface CandidatePair {
  lineIndex: number;
  feature: Readonly<Feature>;
  distance: number;
  sigma: number;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Explicit total order over candidate pairs.
 */
export function comparePairs(a: CandidatePair, b: CandidatePair): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  if (a.sigma !== b.sigma) return b.sigma - a.sigma;
  if (a.lineIndex !== b.lineIndex) return a.lineIndex - b.lineIndex;
  return compareIds(a.feature.id, b.feature.id);
}

/**
 * Combined sigma of an expected line and an observed feature:
 * σ² = u_center² + σ_res² + σ_lib², σ_res from the instrument FWHM.
 */
export function combinedSigma(
  feature: Readonly<Feature>,
  librarySigma: number,
  instrumentFwhm: number
): number {
  const resolution = fwhmToSigma(instrumentFwhm);
  return Math.sqrt(
    feature.centerUncertainty ** 2 + resolution ** 2 + librarySigma ** 2
  );
}

function instrumentFwhmFor(input: SparseScoringInput, feature: Readonly<Feature>): number {
  return input.spectrum(feature.spectrumId)?.lineSpreadFwhm ?? input.rubric.instrumentFwhm;
}

/**
 * Rescale a mean log-likelihood into [0, 1].
 */
function positionScore(meanLogL: number, rubric: Readonly<SparseScoring>): number {
  if (rubric.positionTransform === "geometric_mean") {
    return clampUnit(Math.exp(meanLogL));
  }
  const floor = 0.5 * rubric.matchWindowSigmas ** 2;
  return clampUnit(1 + meanLogL / floor);
}

interface IntensityOutcome {
  value: number | null;
  status: IntensityStatus;
  message?: string;
}

function scoreIntensity(
  input: SparseScoringInput,
  matches: ReadonlyArray<{ match: LineMatch; feature: Readonly<Feature> }>
): IntensityOutcome {
  const { rubric, numerics, template } = input;
  const settings = rubric.intensity;

  const unreliable = matches.find(
    ({ feature }) => input.spectrum(feature.spectrumId)?.intensityCalibration === "unreliable"
  );
  if (unreliable) {
    return {
      value: null,
      status: "unreliable_calibration",
      message: `Intensity calibration of spectrum "${unreliable.feature.spectrumId}" is unreliable; intensity component omitted`,
    };
  }

  const pairs = matches.flatMap(({ match, feature }) => {
    const expected = template.lines[match.expectedIndex]?.relativeIntensity;
    return expected === undefined ? [] : [{ feature, expected }];
  });
  if (pairs.length < settings.minPairs) {
    return { value: null, status: "insufficient_pairs" };
  }

  const units = new Set(pairs.map((p) => p.feature.intensity.unit));
  if (units.size > 1) {
    return {
      value: null,
      status: "degenerate",
      message: `Matched intensities carry mixed units (${[...units].sort().join(", ")}); intensity component omitted`,
    };
  }

  const observed = pairs.map((p) => p.feature.intensity.value);
  const expected = pairs.map((p) => p.expected);

  if (settings.method === "spearman") {
    const rho = pearson(averageRanks(observed), averageRanks(expected), numerics.zeroNormTolerance);
    if (rho === undefined) {
      return {
        value: null,
        status: "degenerate",
        message: "Rank correlation undefined (constant intensities); intensity component omitted",
      };
    }
    return { value: clampUnit((rho + 1) / 2), status: "scored" };
  }

  const observedTotal = sum(observed);
  const expectedTotal = sum(expected);
  if (
    !(Math.abs(observedTotal) > numerics.minDenominator) ||
    !(Math.abs(expectedTotal) > numerics.minDenominator)
  ) {
    return {
      value: null,
      status: "degenerate",
      message: "Intensity normalisation denominator is near zero; intensity component omitted",
    };
  }

  const c2 = settings.robustScale ** 2;
  let loss = 0;
  pairs.forEach((pair, i) => {
    const o = (observed[i] ?? 0) / observedTotal;
    const e = (expected[i] ?? 0) / expectedTotal;
    const sigma = Math.max(
      settings.minSigma,
      Math.sqrt((pair.feature.intensity.uncertainty / Math.abs(observedTotal)) ** 2 + (settings.relativeTolerance * e) ** 2)
    );
    const r = (o - e) / sigma;
    loss += c2 * Math.log1p((r * r) / c2);
  });
  const value = Math.exp(-0.5 * (loss / pairs.length));
  if (!Number.isFinite(value)) {
    return {
      value: null,
      status: "degenerate",
      message: "Robust chi-square produced a non-finite value; intensity component omitted",
    };
  }
  return { value: clampUnit(value), status: "scored" };
}

/**
 * Score one candidate's sparse template against the modality's features.
 */
export function scoreSparse(input: SparseScoringInput): SparseModalityScore {
  const { template, features, rubric } = input;
  const window = rubric.matchWindowSigmas;
  const expectedCount = template.lines.length;
  const messages: string[] = [];

  // Candidate pairs inside the window; also remembers which features fall
  // inside any line's window for the template_range false-positive scope.
  const pairs: CandidatePair[] = [];
  const inRange = new Set<string>();
  template.lines.forEach((line, lineIndex) => {
    for (const feature of features) {
      const sigma = combinedSigma(feature, line.sigma, instrumentFwhmFor(input, feature));
      const distance = Math.abs(feature.center - line.center);
      if (distance <= window * sigma) {
        pairs.push({ lineIndex, feature, distance, sigma });
        inRange.add(feature.id);
      }
    }
  });
  pairs.sort(comparePairs);

  const claimedLines = new Set<number>();
  const claimedFeatures = new Set<string>();
  const assigned: Array<{ match: LineMatch; feature: Readonly<Feature> }> = [];

  for (const pair of pairs) {
    if (claimedLines.has(pair.lineIndex) || claimedFeatures.has(pair.feature.id)) continue;
    claimedLines.add(pair.lineIndex);
    claimedFeatures.add(pair.feature.id);

    const line = template.lines[pair.lineIndex];
    const expectedCenter = line?.center ?? pair.feature.center;
    const z = normalizeZero((pair.feature.center - expectedCenter) / pair.sigma);
    const match: LineMatch = {
      featureId: pair.feature.id,
      spectrumId: pair.feature.spectrumId,
      expectedIndex: pair.lineIndex,
      expectedCenter,
      observedCenter: pair.feature.center,
      sigma: pair.sigma,
      z,
      likelihood: Math.exp(-0.5 * z * z),
      ...(line?.label !== undefined ? { label: line.label } : {}),
    };
    assigned.push({ match, feature: pair.feature });
  }
  assigned.sort((a, b) => compareIds(a.match.featureId, b.match.featureId));

  const unmatched: UnmatchedLine[] = [];
  template.lines.forEach((line, lineIndex) => {
    if (claimedLines.has(lineIndex)) return;
    let nearest: { id: string; distance: number; likelihood: number } | undefined;
    for (const feature of features) {
      const distance = Math.abs(feature.center - line.center);
      if (nearest === undefined || distance < nearest.distance) {
        const sigma = combinedSigma(feature, line.sigma, instrumentFwhmFor(input, feature));
        nearest = { id: feature.id, distance, likelihood: Math.exp(-0.5 * (distance / sigma) ** 2) };
      }
    }
    unmatched.push({
      expectedIndex: lineIndex,
      expectedCenter: line.center,
      ...(line.label !== undefined ? { label: line.label } : {}),
      nearestFeatureId: nearest?.id ?? null,
      nearestLikelihood: nearest?.likelihood ?? 0,
    });
  });

  const observedInScope =
    rubric.falsePositiveScope === "all" ? features.length : inRange.size;
  const matched = assigned.length;
  const falseNegatives = expectedCount - matched;
  const falsePositives = observedInScope - matched;
  const counts = {
    expected: expectedCount,
    observed: observedInScope,
    matched,
    falseNegatives,
    falsePositives,
  };

  const weights = rubric.componentWeights;

  if (features.length === 0) {
    return {
      mode: "sparse",
      modality: template.modality,
      templateSourceId: template.sourceId,
      status: "no_observations",
      score: 0,
      components: { position: 0, coverage: 0, penalty: 0, intensity: null },
      appliedWeights: { ...weights },
      intensityStatus: "insufficient_pairs",
      counts,
      matches: [],
      unmatched,
      messages: [`No usable ${template.modality} features; modality scored 0`],
    };
  }

  let status: ModalityStatus = "ok";

  const logLikelihoods = assigned.map(({ match }) => -0.5 * match.z * match.z);
  const position = matched > 0 ? positionScore(sum(logLikelihoods) / matched, rubric) : 0;
  const coverage = clampUnit(matched / Math.max(1, expectedCount));
  const rawPenalty =
    1 -
    rubric.falseNegativePenalty * (falseNegatives / Math.max(1, expectedCount)) -
    rubric.falsePositivePenalty * (falsePositives / Math.max(1, observedInScope));
  const penalty = clampUnit(rawPenalty);
  if (penalty !== rawPenalty) {
    messages.push(`Penalty component ${rawPenalty.toFixed(4)} for ${template.modality} clamped to ${penalty}`);
  }

  const intensity = scoreIntensity(input, assigned);
  if (intensity.message !== undefined) messages.push(intensity.message);
  if (intensity.status === "degenerate") status = "degraded";

  let applied = { ...weights };
  if (intensity.value === null) {
    const remaining = 1 - weights.intensity;
    applied =
      rubric.renormalizeWithoutIntensity && remaining > input.numerics.minDenominator
        ? {
            position: weights.position / remaining,
            coverage: weights.coverage / remaining,
            penalty: weights.penalty / remaining,
            intensity: 0,
          }
        : { ...weights, intensity: 0 };
  }

  const components: SparseComponents = {
    position,
    coverage,
    penalty,
    intensity: intensity.value,
  };

  const raw =
    applied.position * position +
    applied.coverage * coverage +
    applied.penalty * penalty +
    applied.intensity * (intensity.value ?? 0);

  let score = clampUnit(raw);
  if (!Number.isFinite(raw)) {
    status = "degraded";
    score = 0;
    messages.push(`Sparse score for ${template.modality} was not finite; clamped to 0`);
  } else if (Math.abs(score - raw) > input.numerics.minDenominator) {
    messages.push(`Sparse score ${raw.toFixed(4)} for ${template.modality} clamped to ${score}`);
  }

  return {
    mode: "sparse",
    modality: template.modality,
    templateSourceId: template.sourceId,
    status,
    score,
    components,
    appliedWeights: applied,
    intensityStatus: intensity.status,
    counts,
    matches: assigned.map(({ match }) => match),
    unmatched,
    messages,
  };
}
