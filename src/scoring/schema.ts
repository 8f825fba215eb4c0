/**
 * Per-modality score records.
 *
 * These schemas are the single definition of what a scorer returns; the
 * identification document embeds them unchanged, so a deserialized score
 * is structurally identical to the one the scorer produced.
 */

import { z } from "zod";
import { Modality } from "../config/rubric/enums.js";
import { RunWarningSchema } from "../shared/warnings.js";

const unitScore = z.number().min(0).max(1);

/**
 * Outcome of scoring one modality.
 * - ok:              scored normally
 * - degraded:        scored, but a numerical degeneracy was clamped or flagged
 * - no_observations: a template exists but the modality has no usable data
 */
export const ModalityStatus = z.enum(["ok", "degraded", "no_observations"]);
export type ModalityStatus = z.infer<typeof ModalityStatus>;

/**
 * Why the relative-intensity component was or was not used.
 */
export const IntensityStatus = z.enum([
  "scored",
  "unreliable_calibration",
  "insufficient_pairs",
  "degenerate",
]);
export type IntensityStatus = z.infer<typeof IntensityStatus>;

export const LineMatchSchema = z
  .object({
    featureId: z.string(),
    spectrumId: z.string(),
    expectedIndex: z.number().int().min(0),
    expectedCenter: z.number(),
    observedCenter: z.number(),
    sigma: z.number().positive(),
    z: z.number(),
    likelihood: unitScore,
    label: z.string().optional(),
  })
  .strict();

export type LineMatch = z.infer<typeof LineMatchSchema>;

export const UnmatchedLineSchema = z
  .object({
    expectedIndex: z.number().int().min(0),
    expectedCenter: z.number(),
    label: z.string().optional(),
    nearestFeatureId: z.string().nullable(),
    /** Likelihood against the nearest observed feature; 0 without observations. */
    nearestLikelihood: unitScore,
  })
  .strict();

export type UnmatchedLine = z.infer<typeof UnmatchedLineSchema>;

export const SparseComponentsSchema = z
  .object({
    position: unitScore,
    coverage: unitScore,
    penalty: unitScore,
    intensity: unitScore.nullable(),
  })
  .strict();

export type SparseComponents = z.infer<typeof SparseComponentsSchema>;

export const SparseModalityScoreSchema = z
  .object({
    mode: z.literal("sparse"),
    modality: Modality,
    templateSourceId: z.string(),
    status: ModalityStatus,
    score: unitScore,
    components: SparseComponentsSchema,
    appliedWeights: z
      .object({
        position: z.number(),
        coverage: z.number(),
        penalty: z.number(),
        intensity: z.number(),
      })
      .strict(),
    intensityStatus: IntensityStatus,
    counts: z
      .object({
        expected: z.number().int().min(0),
        observed: z.number().int().min(0),
        matched: z.number().int().min(0),
        falseNegatives: z.number().int().min(0),
        falsePositives: z.number().int().min(0),
      })
      .strict(),
    matches: z.array(LineMatchSchema),
    unmatched: z.array(UnmatchedLineSchema),
    messages: z.array(z.string()),
  })
  .strict();

export type SparseModalityScore = z.infer<typeof SparseModalityScoreSchema>;

export const DenseModalityScoreSchema = z
  .object({
    mode: z.literal("dense"),
    modality: Modality,
    templateSourceId: z.string(),
    status: ModalityStatus,
    score: unitScore,
    correlation: z.number().min(-1).max(1),
    shift: z.number(),
    broadening: z.number().min(0),
    transform: z.string(),
    spectrumId: z.string().nullable(),
    samplesUsed: z.number().int().min(0),
    messages: z.array(z.string()),
  })
  .strict();

export type DenseModalityScore = z.infer<typeof DenseModalityScoreSchema>;

export const ModalityScoreSchema = z.discriminatedUnion("mode", [
  SparseModalityScoreSchema,
  DenseModalityScoreSchema,
]);

export type ModalityScore = z.infer<typeof ModalityScoreSchema>;

/**
 * Quality weight of one modality, computed once per run from QC metadata.
 */
export const QualityAssessmentSchema = z
  .object({
    modality: Modality,
    weight: z.number().min(0).max(1),
    status: z.enum(["ok", "degraded"]),
    spectra: z.array(
      z
        .object({
          spectrumId: z.string(),
          weight: z.number().min(0).max(1),
          penalty: z.number(),
        })
        .strict()
    ),
    messages: z.array(z.string()),
    warnings: z.array(RunWarningSchema),
  })
  .strict();

export type QualityAssessment = z.infer<typeof QualityAssessmentSchema>;
