/**
 * Builders for test inputs. Each returns a valid raw entry; tests override
 * the fields they care about.
 */

import type { CandidateEntryInput } from "../candidates/schema.js";
import type { Modality } from "../config/rubric/enums.js";
import type { FeatureInput, SpectrumMetadataInput } from "../features/schema.js";
import type {
  DenseModalityScore,
  LineMatch,
  ModalityStatus,
  SparseModalityScore,
  UnmatchedLine,
} from "../scoring/schema.js";
import type { ExpectedLine } from "../templates/schema.js";

export function makeFeature(overrides: Partial<FeatureInput> & { id: string; center: number }): FeatureInput {
  return {
    modality: "infrared",
    spectrumId: "ir-1",
    centerUncertainty: 1,
    fwhm: 8,
    fwhmUncertainty: 0.5,
    intensity: { value: 1, unit: "absorbance", uncertainty: 0.01 },
    extraction: { algorithm: "peak-pick", parameters: { threshold: 0.05 } },
    ...overrides,
  };
}

export function makeSpectrum(
  overrides: Partial<SpectrumMetadataInput> & { id: string; modality: Modality }
): SpectrumMetadataInput {
  return {
    qc: { calibrationRms: 0, fwhmDeviation: 0, snr: 1000 },
    ...overrides,
  };
}

export function makeCandidate(
  overrides: Partial<CandidateEntryInput> & { id: string }
): CandidateEntryInput {
  return {
    label: overrides.id,
    components: [overrides.id],
    ...overrides,
  };
}

export function makeSparseTemplate(
  candidateId: string,
  lines: ExpectedLine[],
  overrides: { modality?: Modality; sourceId?: string } = {}
) {
  return {
    kind: "sparse" as const,
    candidateId,
    modality: overrides.modality ?? "infrared",
    sourceId: overrides.sourceId ?? `ref-${candidateId}@1`,
    lines,
  };
}

export function makeDenseTemplate(
  candidateId: string,
  x: number[],
  y: number[],
  overrides: { modality?: Modality; sourceId?: string } = {}
) {
  return {
    kind: "dense" as const,
    candidateId,
    modality: overrides.modality ?? "uv_vis",
    sourceId: overrides.sourceId ?? `uv-${candidateId}@1`,
    samples: { x, y },
  };
}

/** Evenly spaced axis from start with n points. */
export function axis(start: number, step: number, n: number): number[] {
  return Array.from({ length: n }, (_, i) => start + i * step);
}

/** Gaussian peaks evaluated on an axis. */
export function gaussianProfile(
  x: readonly number[],
  peaks: ReadonlyArray<{ center: number; sigma: number; height: number }>
): number[] {
  return x.map((xi) =>
    peaks.reduce((acc, p) => acc + p.height * Math.exp(-0.5 * ((xi - p.center) / p.sigma) ** 2), 0)
  );
}

/** A sparse score record with the given outcome; components are left neutral. */
export function makeSparseScore(
  modality: Modality,
  score: number,
  options: { status?: ModalityStatus; matches?: LineMatch[]; unmatched?: UnmatchedLine[] } = {}
): SparseModalityScore {
  const matches = options.matches ?? [];
  const unmatched = options.unmatched ?? [];
  return {
    mode: "sparse",
    modality,
    templateSourceId: `${modality}-lib@1`,
    status: options.status ?? "ok",
    score,
    components: { position: score, coverage: score, penalty: score, intensity: null },
    appliedWeights: { position: 0.4, coverage: 0.3, penalty: 0.2, intensity: 0 },
    intensityStatus: "insufficient_pairs",
    counts: {
      expected: matches.length + unmatched.length,
      observed: matches.length,
      matched: matches.length,
      falseNegatives: unmatched.length,
      falsePositives: 0,
    },
    matches,
    unmatched,
    messages: [],
  };
}

export function makeDenseScore(
  modality: Modality,
  score: number,
  options: { status?: ModalityStatus; correlation?: number } = {}
): DenseModalityScore {
  return {
    mode: "dense",
    modality,
    templateSourceId: `${modality}-lib@1`,
    status: options.status ?? "ok",
    score,
    correlation: options.correlation ?? score,
    shift: 0.5,
    broadening: 0,
    transform: "linear",
    spectrumId: options.status === "no_observations" ? null : `${modality}-1`,
    samplesUsed: options.status === "no_observations" ? 0 : 100,
    messages: [],
  };
}

/** A matched line with z derived from the centers and sigma. */
export function makeMatch(featureId: string, expectedIndex: number, expected: number, observed: number, sigma: number): LineMatch {
  const z = (observed - expected) / sigma;
  return {
    featureId,
    spectrumId: "ir-1",
    expectedIndex,
    expectedCenter: expected,
    observedCenter: observed,
    sigma,
    z,
    likelihood: Math.exp(-0.5 * z * z),
  };
}
