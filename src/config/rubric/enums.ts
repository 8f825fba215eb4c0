/**
 * Domain enumerations shared by the rubric, the feature store and the scorers.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 *  MODALITY ORDER IS SIGNIFICANT
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The order of Modality.options is the canonical order used for every
 * reduction across modalities (posterior sums, score tables, serialization).
 * Reordering it changes floating-point summation order and therefore the
 * bytes of every recorded identification document.
 */

import { z } from "zod";

/**
 * Measurement techniques, each with its own canonical feature axis.
 *
 *   atomic_emission / atomic_absorption  → wavelength (nm)
 *   infrared / raman                     → wavenumber / shift (cm⁻¹)
 *   uv_vis / fluorescence                → wavelength (nm)
 */
export const Modality = z.enum([
  "atomic_emission",
  "atomic_absorption",
  "infrared",
  "raman",
  "uv_vis",
  "fluorescence",
]);
export type Modality = z.infer<typeof Modality>;

/** Modalities in canonical order. */
export const MODALITY_ORDER: readonly Modality[] = Modality.options;

/**
 * Compare two modalities by canonical order.
 */
export function compareModalities(a: Modality, b: Modality): number {
  return MODALITY_ORDER.indexOf(a) - MODALITY_ORDER.indexOf(b);
}

/**
 * Scoring mode for a modality.
 * - sparse: discrete lines/bands matched one-to-one against observed features
 * - dense:  continuous template cross-correlated against a sampled segment
 */
export const ScoringMode = z.enum(["sparse", "dense"]);
export type ScoringMode = z.infer<typeof ScoringMode>;

/**
 * Profile family reported by feature extraction.
 */
export const ShapeFamily = z.enum(["gaussian", "lorentzian", "voigt", "unknown"]);
export type ShapeFamily = z.infer<typeof ShapeFamily>;

/**
 * Per-feature data quality flags set by upstream extraction.
 */
export const QualityFlag = z.enum([
  "bad_pixel", // Known bad/dead detector pixel
  "cosmic_ray", // Cosmic ray hit detected
  "saturated", // Detector saturation
  "low_snr", // Signal-to-noise ratio below extraction threshold
  "interpolated", // Value interpolated from neighbours
  "extrapolated", // Value extrapolated beyond the original range
  "user_flagged", // Manually flagged by an operator
  "questionable", // Automatically flagged as suspicious
]);
export type QualityFlag = z.infer<typeof QualityFlag>;

/**
 * Relative-intensity agreement measure used by sparse scoring.
 */
export const IntensityMethod = z.enum(["spearman", "chi_square"]);
export type IntensityMethod = z.infer<typeof IntensityMethod>;

/**
 * Rescaling of the mean matched log-likelihood into [0, 1].
 * - geometric_mean: exp(mean log L)
 * - linear:         1 + mean log L / (½ w²), w = match window in sigmas
 */
export const PositionTransform = z.enum(["geometric_mean", "linear"]);
export type PositionTransform = z.infer<typeof PositionTransform>;

/**
 * Which unclaimed observed features count as false positives.
 * - all:            every usable feature of the modality
 * - template_range: only features inside the template's matching range
 */
export const FalsePositiveScope = z.enum(["all", "template_range"]);
export type FalsePositiveScope = z.infer<typeof FalsePositiveScope>;

/**
 * Confidence tier assigned to a ranked hypothesis.
 */
export const ConfidenceTier = z.enum(["A", "B", "C"]);
export type ConfidenceTier = z.infer<typeof ConfidenceTier>;
