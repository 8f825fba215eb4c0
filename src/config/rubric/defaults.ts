/**
 * Default rubric.
 *
 * A conservative starting point: sparse line matching for the atomic,
 * infrared and Raman modalities, dense template correlation for UV-visible
 * and fluorescence. Laboratories are expected to ship their own calibrated
 * rubric; this one exists so the engine and its tests have a valid baseline.
 */

import type { ModalityRubric, Rubric, SparseScoring, DenseScoring } from "./schema.js";

function sparseSection(instrumentFwhm: number): SparseScoring {
  return {
    componentWeights: { position: 0.4, coverage: 0.3, penalty: 0.2, intensity: 0.1 },
    matchWindowSigmas: 2,
    instrumentFwhm,
    falseNegativePenalty: 0.5,
    falsePositivePenalty: 0.25,
    falsePositiveScope: "all",
    positionTransform: "linear",
    intensity: {
      method: "spearman",
      minPairs: 3,
      robustScale: 2,
      relativeTolerance: 0.2,
      minSigma: 0.01,
    },
    renormalizeWithoutIntensity: false,
  };
}

function denseSection(lineSpreadFwhm: number): DenseScoring {
  return {
    shift: { min: -2, max: 2, points: 9 },
    broadening: { min: 0, max: 2, points: 5 },
    continuumDegree: 1,
    segmentPadding: 5,
    lineSpreadFwhm,
    transform: { kind: "fisher_z", referenceCorrelation: 0.95 },
  };
}

const atomic = (fusionWeight: number): ModalityRubric => ({
  mode: "sparse",
  fusionWeight,
  quality: { a: 0.3, b: 0.2, c: 0.3, tauRms: 0.01, tauFwhm: 0.05, tauSnr: 10 },
  sparse: sparseSection(0.05),
});

export const DEFAULT_RUBRIC: Rubric = {
  rubricVersion: "1.0.0",
  name: "default-cross-modal",
  link: { epsilon: 1e-6 },
  modalities: {
    atomic_emission: atomic(1.0),
    atomic_absorption: atomic(1.0),
    infrared: {
      mode: "sparse",
      fusionWeight: 1.0,
      quality: { a: 0.3, b: 0.2, c: 0.3, tauRms: 1, tauFwhm: 2, tauSnr: 20 },
      sparse: sparseSection(4),
    },
    raman: {
      mode: "sparse",
      fusionWeight: 0.9,
      quality: { a: 0.3, b: 0.2, c: 0.3, tauRms: 1, tauFwhm: 2, tauSnr: 20 },
      sparse: sparseSection(3),
    },
    uv_vis: {
      mode: "dense",
      fusionWeight: 0.6,
      quality: { a: 0.3, b: 0.2, c: 0.3, tauRms: 0.5, tauFwhm: 1, tauSnr: 30 },
      dense: denseSection(1),
    },
    fluorescence: {
      mode: "dense",
      fusionWeight: 0.5,
      quality: { a: 0.3, b: 0.2, c: 0.3, tauRms: 0.5, tauFwhm: 1, tauSnr: 30 },
      dense: denseSection(2),
    },
  },
  quality: { floor: 0.3, ceiling: 1.0 },
  fusion: {
    defaultLogPrior: 0,
    parsimonyPerComponent: 0.5,
    maxAlternatives: 3,
    tieTolerance: 0,
  },
  tiers: {
    thetaA: 0.85,
    deltaA: 0.15,
    sMin: 0.55,
    thetaB: 0.6,
    deltaB: 0.05,
    sStrong: 0.8,
    singleModalityMinMatches: 5,
  },
  features: {
    excludeFlags: ["saturated", "cosmic_ray", "bad_pixel"],
  },
  numerics: {
    zeroNormTolerance: 1e-12,
    minDenominator: 1e-9,
  },
};
