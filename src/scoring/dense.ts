/**
 * Dense-mode scoring: template cross-correlation over a shift/broadening
 * grid.
 *
 * The observed segment is cut to the template range plus padding and has
 * its polynomial continuum removed. For every grid point the template is
 * convolved with a Gaussian line-spread kernel, shifted, sampled on the
 * observed axis and continuum-corrected the same way; the normalized
 * cross-correlation with the observed residual decides the best trial.
 * Grid order is shift-major, both axes ascending, and only a strictly
 * greater correlation replaces the incumbent.
 */

import type { DenseScoring, Numerics } from "../config/rubric/schema.js";
import type { SpectrumMetadata } from "../features/schema.js";
import type { DenseTemplate } from "../templates/schema.js";
import {
  clamp,
  dot,
  fwhmToSigma,
  gridValues,
  norm,
  normalizeZero,
  removeContinuum,
  scaleToUnitRange,
  trapezoidWeights,
} from "./numeric.js";
import type { DenseModalityScore, ModalityStatus } from "./schema.js";
import { transformCorrelation } from "./transforms.js";

const INV_SQRT_2PI = 1 / Math.sqrt(2 * Math.PI);

export interface DenseScoringInput {
  template: Readonly<DenseTemplate>;
  /** Spectra of the template's modality, sorted by id. */
  spectra: ReadonlyArray<Readonly<SpectrumMetadata>>;
  rubric: Readonly<DenseScoring>;
  numerics: Readonly<Numerics>;
}

interface Trial {
  shift: number;
  broadening: number;
  correlation: number;
  degenerate: boolean;
}

/**
 * Template convolved with a normalized Gaussian of width sigma, shifted by
 * `shift`, evaluated at each observed x.
 */
export function convolveTemplate(
  templateX: readonly number[],
  templateY: readonly number[],
  weights: readonly number[],
  observedX: readonly number[],
  shift: number,
  sigma: number
): number[] {
  return observedX.map((x) => {
    let acc = 0;
    for (let j = 0; j < templateX.length; j++) {
      const d = (x - shift - (templateX[j] ?? 0)) / sigma;
      acc += (weights[j] ?? 0) * (templateY[j] ?? 0) * Math.exp(-0.5 * d * d);
    }
    return (acc * INV_SQRT_2PI) / sigma;
  });
}

/**
 * Score one candidate's dense template against the modality's sampled
 * segment.
 */
export function scoreDense(input: DenseScoringInput): DenseModalityScore {
  const { template, rubric, numerics } = input;
  const shifts = gridValues(rubric.shift);
  const broadenings = gridValues(rubric.broadening);
  const firstShift = shifts[0] ?? 0;
  const firstBroadening = broadenings[0] ?? 0;

  const base = {
    mode: "dense" as const,
    modality: template.modality,
    templateSourceId: template.sourceId,
    transform: rubric.transform.kind,
  };

  const sampled = input.spectra.filter((s) => s.samples !== undefined);
  const spectrum = sampled[0];
  const samples = spectrum?.samples;

  if (spectrum === undefined || samples === undefined) {
    return {
      ...base,
      status: "no_observations",
      score: 0,
      correlation: 0,
      shift: normalizeZero(firstShift),
      broadening: normalizeZero(firstBroadening),
      spectrumId: null,
      samplesUsed: 0,
      messages: [`No sampled ${template.modality} segment; modality scored 0`],
    };
  }

  const messages: string[] = [];
  if (sampled.length > 1) {
    messages.push(
      `${sampled.length} sampled ${template.modality} spectra; scored against "${spectrum.id}"`
    );
  }

  const tx = template.samples.x;
  const ty = template.samples.y;
  const lo = (tx[0] ?? 0) - rubric.segmentPadding;
  const hi = (tx[tx.length - 1] ?? 0) + rubric.segmentPadding;

  const xs: number[] = [];
  const ys: number[] = [];
  samples.x.forEach((x, i) => {
    if (x >= lo && x <= hi) {
      xs.push(x);
      ys.push(samples.y[i] ?? 0);
    }
  });

  if (xs.length < 2) {
    return {
      ...base,
      status: "no_observations",
      score: 0,
      correlation: 0,
      shift: normalizeZero(firstShift),
      broadening: normalizeZero(firstBroadening),
      spectrumId: spectrum.id,
      samplesUsed: xs.length,
      messages: [
        ...messages,
        `Spectrum "${spectrum.id}" has fewer than 2 samples within [${lo}, ${hi}]; modality scored 0`,
      ],
    };
  }

  let status: ModalityStatus = "ok";
  const scaled = scaleToUnitRange(xs);
  const observed = removeContinuum(scaled, ys, rubric.continuumDegree, numerics.zeroNormTolerance);
  if (observed.singular) {
    status = "degraded";
    messages.push(
      `Continuum fit of degree ${rubric.continuumDegree} is singular on "${spectrum.id}"; only the mean was removed`
    );
  }

  const observedNorm = norm(observed.residual);
  const sigmaLsf = fwhmToSigma(spectrum.lineSpreadFwhm ?? rubric.lineSpreadFwhm);
  const weights = trapezoidWeights(tx);

  let best: Trial | undefined;
  let degenerateTrials = 0;

  for (const shift of shifts) {
    for (const broadening of broadenings) {
      const sigma = Math.sqrt(sigmaLsf ** 2 + broadening ** 2);
      const model = convolveTemplate(tx, ty, weights, xs, shift, sigma);
      const modelResidual = removeContinuum(
        scaled,
        model,
        rubric.continuumDegree,
        numerics.zeroNormTolerance
      ).residual;
      const modelNorm = norm(modelResidual);

      const degenerate =
        !(observedNorm > numerics.zeroNormTolerance) || !(modelNorm > numerics.zeroNormTolerance);
      const raw = degenerate ? 0 : dot(modelResidual, observed.residual) / (modelNorm * observedNorm);
      const correlation = Number.isFinite(raw) ? clamp(raw, -1, 1) : 0;
      if (degenerate) degenerateTrials++;

      if (best === undefined || correlation > best.correlation) {
        best = { shift, broadening, correlation, degenerate };
      }
    }
  }

  const winner = best ?? {
    shift: firstShift,
    broadening: firstBroadening,
    correlation: 0,
    degenerate: true,
  };

  if (!(observedNorm > numerics.zeroNormTolerance)) {
    status = "degraded";
    messages.push(`Observed segment of "${spectrum.id}" has zero norm after continuum removal; correlation set to 0`);
  } else if (degenerateTrials === shifts.length * broadenings.length) {
    status = "degraded";
    messages.push(`Template ${template.sourceId} has zero norm on the observed axis; correlation set to 0`);
  }

  const transformed = transformCorrelation(winner.correlation, rubric.transform, numerics);
  if (transformed.clamped) {
    messages.push(
      `${rubric.transform.kind} transform of correlation ${winner.correlation.toFixed(4)} gave ${transformed.raw.toFixed(4)}; clamped to ${transformed.score}`
    );
  }

  return {
    ...base,
    status,
    score: transformed.score,
    correlation: normalizeZero(winner.correlation),
    shift: normalizeZero(winner.shift),
    broadening: normalizeZero(winner.broadening),
    spectrumId: spectrum.id,
    samplesUsed: xs.length,
    messages,
  };
}
