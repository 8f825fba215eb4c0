/**
 * Tests for dense-mode scoring and the correlation transforms.
 *
 * Run: node --import tsx --test src/scoring/dense.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { DEFAULT_RUBRIC } from "../config/rubric/defaults.js";
import type { DenseScoring } from "../config/rubric/schema.js";
import { SpectrumMetadataSchema, type SampledSegment } from "../features/schema.js";
import { axis, gaussianProfile, makeDenseTemplate, makeSpectrum } from "../testing/fixtures.js";
import { convolveTemplate, scoreDense } from "./dense.js";
import { fwhmToSigma, gridValues, trapezoidWeights } from "./numeric.js";
import { applyCorrelationTransform, transformCorrelation } from "./transforms.js";

const RUBRIC: DenseScoring = {
  shift: { min: -2, max: 2, points: 9 },
  broadening: { min: 0, max: 2, points: 5 },
  continuumDegree: 1,
  segmentPadding: 10,
  lineSpreadFwhm: 1,
  transform: { kind: "linear" },
};

const numerics = DEFAULT_RUBRIC.numerics;
const templateX = axis(480, 1, 41);
const templateY = gaussianProfile(templateX, [{ center: 500, sigma: 3, height: 1 }]);
const template = makeDenseTemplate("dye", templateX, templateY);

function spectrum(id: string, samples: SampledSegment) {
  return SpectrumMetadataSchema.parse(makeSpectrum({ id, modality: "uv_vis", samples }));
}

function score(spectra: ReturnType<typeof spectrum>[], rubric: Partial<DenseScoring> = {}) {
  return scoreDense({ template, spectra, rubric: { ...RUBRIC, ...rubric }, numerics });
}

/** The model the scorer would build at (shift, broadening 0). */
function modelAt(observedX: number[], shift: number): number[] {
  return convolveTemplate(
    templateX,
    templateY,
    trapezoidWeights(templateX),
    observedX,
    shift,
    fwhmToSigma(RUBRIC.lineSpreadFwhm)
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// GRID SEARCH
// ═══════════════════════════════════════════════════════════════════════════

describe("scoreDense grid search", () => {
  const observedX = axis(470, 0.5, 121);

  it("recovers the shift of a shifted template", () => {
    const result = score([spectrum("uv-1", { x: observedX, y: modelAt(observedX, 1) })]);
    assert.equal(result.status, "ok");
    assert.equal(result.shift, 1);
    assert.equal(result.broadening, 0);
    assert.ok(Math.abs(result.correlation - 1) < 1e-9);
    assert.ok(Math.abs(result.score - 1) < 1e-9);
    assert.equal(result.spectrumId, "uv-1");
    assert.equal(result.samplesUsed, 121);
    assert.equal(result.transform, "linear");
  });

  it("ignores a linear continuum under the signal", () => {
    const y = modelAt(observedX, -1.5).map((v, i) => v + 0.02 * i + 3);
    const result = score([spectrum("uv-1", { x: observedX, y })]);
    assert.equal(result.shift, -1.5);
    assert.ok(Math.abs(result.correlation - 1) < 1e-9);
  });

  it("scores against the first sampled spectrum by id and says so", () => {
    const good = spectrum("uv-a", { x: observedX, y: modelAt(observedX, 0) });
    const other = spectrum("uv-b", { x: observedX, y: observedX.map(() => 0) });
    const result = score([good, other]);
    assert.equal(result.spectrumId, "uv-a");
    assert.deepStrictEqual(result.messages, ['2 sampled uv_vis spectra; scored against "uv-a"']);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// DEGENERATE INPUT
// ═══════════════════════════════════════════════════════════════════════════

describe("scoreDense degenerate input", () => {
  it("scores 0 without a sampled spectrum", () => {
    const result = score([]);
    assert.equal(result.status, "no_observations");
    assert.equal(result.score, 0);
    assert.equal(result.spectrumId, null);
    assert.equal(result.shift, -2);
    assert.equal(result.broadening, 0);
  });

  it("scores 0 when the segment misses the template range", () => {
    const result = score([spectrum("uv-1", { x: axis(900, 1, 10), y: axis(0, 1, 10) })]);
    assert.equal(result.status, "no_observations");
    assert.equal(result.spectrumId, "uv-1");
    assert.equal(result.samplesUsed, 0);
  });

  it("degrades a flat segment to correlation 0", () => {
    const x = axis(470, 0.5, 121);
    const result = score([spectrum("uv-1", { x, y: x.map(() => 0) })]);
    assert.equal(result.status, "degraded");
    assert.equal(result.correlation, 0);
    assert.equal(result.score, 0);
    assert.equal(Number.isFinite(result.score), true);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

describe("dense helpers", () => {
  it("evaluates a single-point grid axis at its midpoint", () => {
    assert.deepStrictEqual(gridValues({ min: -1, max: 3, points: 1 }), [1]);
    assert.deepStrictEqual(gridValues({ min: 0, max: 2, points: 5 }), [0, 0.5, 1, 1.5, 2]);
  });

  it("convolves with a normalized Gaussian", () => {
    const [peak] = convolveTemplate([10], [1], [1], [12], 2, 0.5);
    assert.ok(peak !== undefined);
    assert.ok(Math.abs(peak - 2 / Math.sqrt(2 * Math.PI)) < 1e-15);
  });

  it("maps correlations monotonically into [0, 1]", () => {
    assert.equal(applyCorrelationTransform(-0.5, { kind: "linear" }, numerics), 0);
    assert.equal(applyCorrelationTransform(0.25, { kind: "linear" }, numerics), 0.25);
    assert.equal(
      applyCorrelationTransform(0.2, { kind: "logistic", midpoint: 0.2, steepness: 10 }, numerics),
      0.5
    );
    assert.equal(applyCorrelationTransform(0, { kind: "fisher_z", referenceCorrelation: 0.9 }, numerics), 0);
    assert.equal(applyCorrelationTransform(1, { kind: "fisher_z", referenceCorrelation: 0.9 }, numerics), 1);
    const mid = applyCorrelationTransform(0.5, { kind: "fisher_z", referenceCorrelation: 0.9 }, numerics);
    assert.ok(Math.abs(mid - Math.atanh(0.5) / Math.atanh(0.9)) < 1e-15);
  });

  it("reports when the clamp changes the value", () => {
    assert.deepStrictEqual(transformCorrelation(-0.5, { kind: "linear" }, numerics), {
      score: 0,
      raw: -0.5,
      clamped: true,
    });
    assert.deepStrictEqual(transformCorrelation(0.25, { kind: "linear" }, numerics), {
      score: 0.25,
      raw: 0.25,
      clamped: false,
    });
    const above = transformCorrelation(0.95, { kind: "fisher_z", referenceCorrelation: 0.9 }, numerics);
    assert.equal(above.score, 1);
    assert.equal(above.clamped, true);
    assert.ok(Math.abs(above.raw - Math.atanh(0.95) / Math.atanh(0.9)) < 1e-12);
  });

  it("flags a clamped transform in the score messages", () => {
    const observedX = axis(470, 0.5, 121);
    const result = score([spectrum("uv-1", { x: observedX, y: modelAt(observedX, 0) })], {
      transform: { kind: "fisher_z", referenceCorrelation: 0.9 },
    });
    assert.equal(result.status, "ok");
    assert.equal(result.score, 1);
    assert.equal(result.messages.length, 1);
    assert.match(result.messages[0] ?? "", /^fisher_z transform of correlation 1\.0000 gave \d+\.\d{4}; clamped to 1$/);
  });
});
