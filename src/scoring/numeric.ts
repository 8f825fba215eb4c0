/**
 * Numeric helpers shared by the scorers and the fusion engine.
 *
 * Everything here is a pure function of its arguments. Tolerances are
 * passed in by the caller (they come from the rubric's numerics section);
 * the only literals are mathematical constants.
 */

import type { GridAxis } from "../config/rubric/schema.js";

/** σ = FWHM · FWHM_TO_SIGMA for a Gaussian profile (1 / 2√(2 ln 2)). */
export const FWHM_TO_SIGMA = 1 / (2 * Math.sqrt(2 * Math.LN2));

export function fwhmToSigma(fwhm: number): number {
  return fwhm * FWHM_TO_SIGMA;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Clamp into [0, 1], mapping NaN to 0.
 */
export function clampUnit(value: number): number {
  return Number.isNaN(value) ? 0 : clamp(value, 0, 1);
}

/**
 * Logistic function, evaluated without overflow for large |x|.
 */
export function logistic(x: number): number {
  if (x >= 0) {
    return 1 / (1 + Math.exp(-x));
  }
  const e = Math.exp(x);
  return e / (1 + e);
}

/**
 * Replace -0 with 0 so serialized numbers never carry a sign artefact.
 */
export function normalizeZero(value: number): number {
  return value === 0 ? 0 : value;
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

export function dot(a: readonly number[], b: readonly number[]): number {
  let total = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    total += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return total;
}

export function norm(values: readonly number[]): number {
  return Math.sqrt(dot(values, values));
}

/**
 * Evenly spaced trial values of a grid axis, ascending.
 * A single-point axis evaluates its midpoint.
 */
export function gridValues(axis: GridAxis): number[] {
  if (axis.points === 1) {
    return [(axis.min + axis.max) / 2];
  }
  const step = (axis.max - axis.min) / (axis.points - 1);
  return Array.from({ length: axis.points }, (_, i) =>
    i === axis.points - 1 ? axis.max : axis.min + i * step
  );
}

/**
 * Fractional ranks (1-based), ties receiving the average of their ranks.
 */
export function averageRanks(values: readonly number[]): number[] {
  const order = values.map((value, index) => ({ value, index }));
  order.sort((a, b) => a.value - b.value || a.index - b.index);

  const ranks = new Array<number>(values.length).fill(0);
  let i = 0;
  while (i < order.length) {
    let j = i;
    while (j + 1 < order.length && order[j + 1]?.value === order[i]?.value) j++;
    const rank = (i + j) / 2 + 1;
    for (let k = i; k <= j; k++) {
      const entry = order[k];
      if (entry) ranks[entry.index] = rank;
    }
    i = j + 1;
  }
  return ranks;
}

/**
 * Pearson correlation, or undefined when either series has (near) zero
 * variance.
 */
export function pearson(
  a: readonly number[],
  b: readonly number[],
  zeroTolerance: number
): number | undefined {
  const n = Math.min(a.length, b.length);
  if (n < 2) return undefined;
  const meanA = sum(a.slice(0, n)) / n;
  const meanB = sum(b.slice(0, n)) / n;
  let sab = 0;
  let saa = 0;
  let sbb = 0;
  for (let i = 0; i < n; i++) {
    const da = (a[i] ?? 0) - meanA;
    const db = (b[i] ?? 0) - meanB;
    sab += da * db;
    saa += da * da;
    sbb += db * db;
  }
  const denominator = Math.sqrt(saa * sbb);
  if (!(denominator > zeroTolerance)) return undefined;
  return clamp(sab / denominator, -1, 1);
}

/**
 * Solve A·x = b by Gaussian elimination with partial pivoting.
 * Returns undefined when a pivot falls below the tolerance.
 */
export function solveLinearSystem(
  matrix: readonly (readonly number[])[],
  rhs: readonly number[],
  pivotTolerance: number
): number[] | undefined {
  const n = rhs.length;
  const a = matrix.map((row, i) => [...row.slice(0, n), rhs[i] ?? 0]);

  for (let col = 0; col < n; col++) {
    let pivotRow = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(a[row]?.[col] ?? 0) > Math.abs(a[pivotRow]?.[col] ?? 0)) pivotRow = row;
    }
    const pivot = a[pivotRow];
    const current = a[col];
    if (!pivot || !current || !(Math.abs(pivot[col] ?? 0) > pivotTolerance)) {
      return undefined;
    }
    a[col] = pivot;
    a[pivotRow] = current;

    const p = pivot[col] ?? 0;
    for (let row = col + 1; row < n; row++) {
      const target = a[row];
      if (!target) continue;
      const factor = (target[col] ?? 0) / p;
      for (let k = col; k <= n; k++) {
        target[k] = (target[k] ?? 0) - factor * (pivot[k] ?? 0);
      }
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let row = n - 1; row >= 0; row--) {
    const r = a[row];
    if (!r) return undefined;
    let acc = r[n] ?? 0;
    for (let k = row + 1; k < n; k++) acc -= (r[k] ?? 0) * (x[k] ?? 0);
    x[row] = acc / (r[row] ?? 1);
  }
  return x.every(Number.isFinite) ? x : undefined;
}

/**
 * Map x onto [-1, 1] over its own range (constant input maps to 0).
 */
export function scaleToUnitRange(x: readonly number[]): number[] {
  const lo = Math.min(...x);
  const hi = Math.max(...x);
  const half = (hi - lo) / 2;
  if (!(half > 0)) return x.map(() => 0);
  return x.map((v) => (v - lo) / half - 1);
}

export interface ContinuumRemoval {
  residual: number[];
  /** True when the polynomial fit was singular and only the mean was removed. */
  singular: boolean;
}

/**
 * Subtract the least-squares polynomial of the given degree.
 * `scaledX` should already be mapped to [-1, 1] for conditioning.
 */
export function removeContinuum(
  scaledX: readonly number[],
  y: readonly number[],
  degree: number,
  pivotTolerance: number
): ContinuumRemoval {
  const terms = degree + 1;
  const normal: number[][] = Array.from({ length: terms }, () => new Array<number>(terms).fill(0));
  const rhs = new Array<number>(terms).fill(0);

  for (let i = 0; i < y.length; i++) {
    const powers = new Array<number>(terms);
    let p = 1;
    for (let k = 0; k < terms; k++) {
      powers[k] = p;
      p *= scaledX[i] ?? 0;
    }
    for (let r = 0; r < terms; r++) {
      const row = normal[r];
      if (!row) continue;
      for (let c = 0; c < terms; c++) {
        row[c] = (row[c] ?? 0) + (powers[r] ?? 0) * (powers[c] ?? 0);
      }
      rhs[r] = (rhs[r] ?? 0) + (powers[r] ?? 0) * (y[i] ?? 0);
    }
  }

  const coefficients = y.length > degree ? solveLinearSystem(normal, rhs, pivotTolerance) : undefined;
  if (coefficients === undefined) {
    const mean = y.length > 0 ? sum(y) / y.length : 0;
    return { residual: y.map((v) => v - mean), singular: true };
  }

  const residual = y.map((v, i) => {
    let fit = 0;
    let p = 1;
    for (const c of coefficients) {
      fit += c * p;
      p *= scaledX[i] ?? 0;
    }
    return v - fit;
  });
  return { residual, singular: false };
}

/**
 * Trapezoid quadrature weights for samples on an ascending axis.
 */
export function trapezoidWeights(x: readonly number[]): number[] {
  const n = x.length;
  if (n < 2) return x.map(() => 1);
  return x.map((_, i) => {
    const left = i > 0 ? (x[i] ?? 0) - (x[i - 1] ?? 0) : 0;
    const right = i < n - 1 ? (x[i + 1] ?? 0) - (x[i] ?? 0) : 0;
    return (left + right) / 2;
  });
}
