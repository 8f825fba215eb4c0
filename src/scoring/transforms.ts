/**
 * Correlation-to-score transforms for dense mode.
 *
 * The rubric names a transform by kind; this registry maps each kind to a
 * monotonic function of the correlation peak C ∈ [-1, 1]. The raw value may
 * leave [0, 1] (a Fisher-z ratio above the reference, a negative
 * correlation); transformCorrelation() clamps it and reports the clamp.
 * Registering a new kind means adding a variant to CorrelationTransformSchema
 * and an entry here.
 */

import type { CorrelationTransform, Numerics } from "../config/rubric/schema.js";
import { clamp, clampUnit, logistic } from "./numeric.js";

type TransformOf<K extends CorrelationTransform["kind"]> = Extract<CorrelationTransform, { kind: K }>;

export type CorrelationTransformFn<K extends CorrelationTransform["kind"]> = (
  correlation: number,
  params: TransformOf<K>,
  numerics: Readonly<Numerics>
) => number;

export type CorrelationTransformRegistry = {
  readonly [K in CorrelationTransform["kind"]]: CorrelationTransformFn<K>;
};

export const CORRELATION_TRANSFORMS: CorrelationTransformRegistry = {
  fisher_z: (correlation, params, numerics) => {
    const limit = 1 - numerics.minDenominator;
    const c = clamp(correlation, -limit, limit);
    return Math.atanh(c) / Math.atanh(params.referenceCorrelation);
  },
  linear: (correlation) => correlation,
  logistic: (correlation, params) => logistic(params.steepness * (correlation - params.midpoint)),
};

export interface TransformedCorrelation {
  /** Score in [0, 1] */
  score: number;
  /** Transform output before clamping */
  raw: number;
  clamped: boolean;
}

function rawTransform(
  correlation: number,
  transform: Readonly<CorrelationTransform>,
  numerics: Readonly<Numerics>
): number {
  switch (transform.kind) {
    case "fisher_z":
      return CORRELATION_TRANSFORMS.fisher_z(correlation, transform, numerics);
    case "linear":
      return CORRELATION_TRANSFORMS.linear(correlation, transform, numerics);
    case "logistic":
      return CORRELATION_TRANSFORMS.logistic(correlation, transform, numerics);
  }
}

/**
 * Map a correlation peak through the rubric-declared transform, clamping
 * into [0, 1]. `clamped` is set when the clamp changed the value.
 */
export function transformCorrelation(
  correlation: number,
  transform: Readonly<CorrelationTransform>,
  numerics: Readonly<Numerics>
): TransformedCorrelation {
  const raw = rawTransform(correlation, transform, numerics);
  const score = clampUnit(raw);
  return { score, raw, clamped: score !== raw };
}

export function applyCorrelationTransform(
  correlation: number,
  transform: Readonly<CorrelationTransform>,
  numerics: Readonly<Numerics>
): number {
  return transformCorrelation(correlation, transform, numerics).score;
}
