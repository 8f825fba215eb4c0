/**
 * Rubric schema definition.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * THE RUBRIC IS THE ONLY SOURCE OF SCORING CONSTANTS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Every weight, threshold, tolerance and search bound used while scoring
 * comes from this document. Scoring code reads it and never falls back to
 * literals of its own. Consequences:
 *
 * 1. REPRODUCIBILITY: an identification document records the rubric name,
 *    version and content digest, which is enough to replay the run.
 *
 * 2. IMMUTABILITY: the loader deep-freezes the validated rubric. Changing
 *    scoring behaviour means loading a different rubric for a new run.
 *
 * 3. FAIL FAST: a malformed rubric (weights not summing to 1, a missing
 *    threshold, a mode without its section) is rejected before any
 *    candidate is scored, with one issue per offending field.
 */

import { z } from "zod";
import {
  ScoringMode,
  IntensityMethod,
  PositionTransform,
  FalsePositiveScope,
  QualityFlag,
} from "./enums.js";

/** Accepted deviation of a weight sum from 1. */
export const WEIGHT_SUM_TOLERANCE = 1e-9;

const unitInterval = z.number().min(0).max(1);

/**
 * Sparse-mode component weights: S = w_pos·s_pos + w_cov·s_cov + w_pen·s_pen + w_int·s_int.
 */
export const ComponentWeightsSchema = z
  .object({
    position: unitInterval.describe("Weight of the position-likelihood component"),
    coverage: unitInterval.describe("Weight of the matched/expected coverage component"),
    penalty: unitInterval.describe("Weight of the false negative/positive penalty component"),
    intensity: unitInterval.describe("Weight of the relative-intensity agreement component"),
  })
  .strict()
  .superRefine((weights, ctx) => {
    const sum = weights.position + weights.coverage + weights.penalty + weights.intensity;
    if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Component weights must sum to 1 (position + coverage + penalty + intensity = ${sum})`,
      });
    }
  });

export type ComponentWeights = z.infer<typeof ComponentWeightsSchema>;

/**
 * Relative-intensity scoring constants.
 */
export const IntensityScoringSchema = z
  .object({
    method: IntensityMethod.describe("Rank correlation or robust chi-square"),
    minPairs: z
      .number()
      .int()
      .min(2)
      .describe("Minimum matched lines with expected intensities before s_int is computed"),
    robustScale: z
      .number()
      .positive()
      .describe("Cauchy-loss scale c for the robust chi-square, in residual sigmas"),
    relativeTolerance: z
      .number()
      .min(0)
      .describe("Fractional library uncertainty on expected relative intensities"),
    minSigma: z
      .number()
      .positive()
      .describe("Floor applied to a relative-intensity residual sigma"),
  })
  .strict();

export type IntensityScoring = z.infer<typeof IntensityScoringSchema>;

/**
 * Sparse (line/band matching) scoring section.
 */
export const SparseScoringSchema = z
  .object({
    componentWeights: ComponentWeightsSchema,
    matchWindowSigmas: z
      .number()
      .positive()
      .describe("Match acceptance window in combined sigmas"),
    instrumentFwhm: z
      .number()
      .min(0)
      .describe("Fallback instrument resolution FWHM when the spectrum supplies none"),
    falseNegativePenalty: z.number().min(0).describe("α: penalty per missed expected feature"),
    falsePositivePenalty: z.number().min(0).describe("β: penalty per unclaimed observed feature"),
    falsePositiveScope: FalsePositiveScope,
    positionTransform: PositionTransform,
    intensity: IntensityScoringSchema,
    renormalizeWithoutIntensity: z
      .boolean()
      .describe("Rescale the remaining weights to sum to 1 when s_int is omitted"),
  })
  .strict();

export type SparseScoring = z.infer<typeof SparseScoringSchema>;

/**
 * One axis of the dense-mode trial grid.
 */
export const GridAxisSchema = z
  .object({
    min: z.number(),
    max: z.number(),
    points: z.number().int().min(1),
  })
  .strict()
  .refine((axis) => axis.max >= axis.min, {
    message: "Grid axis max must be greater than or equal to min",
    path: ["max"],
  });

export type GridAxis = z.infer<typeof GridAxisSchema>;

/**
 * Monotonic mapping of the cross-correlation peak C ∈ [-1, 1] to a score.
 */
export const CorrelationTransformSchema = z.discriminatedUnion("kind", [
  z
    .object({
      kind: z.literal("fisher_z"),
      referenceCorrelation: z
        .number()
        .gt(0)
        .lt(1)
        .describe("Correlation that maps to a full score of 1"),
    })
    .strict(),
  z.object({ kind: z.literal("linear") }).strict(),
  z
    .object({
      kind: z.literal("logistic"),
      midpoint: z.number().min(-1).max(1),
      steepness: z.number().positive(),
    })
    .strict(),
]);

export type CorrelationTransform = z.infer<typeof CorrelationTransformSchema>;

/**
 * Dense (template cross-correlation) scoring section.
 */
export const DenseScoringSchema = z
  .object({
    shift: GridAxisSchema.describe("Trial shifts Δ in axis units"),
    broadening: GridAxisSchema.refine((axis) => axis.min >= 0, {
      message: "Broadening must be non-negative",
      path: ["min"],
    }).describe("Trial extra Gaussian broadening γ in axis units"),
    continuumDegree: z.number().int().min(0).max(8),
    segmentPadding: z
      .number()
      .min(0)
      .describe("Observed samples kept beyond the template range, in axis units"),
    lineSpreadFwhm: z
      .number()
      .positive()
      .describe("Fallback instrument line-spread FWHM when the spectrum supplies none"),
    transform: CorrelationTransformSchema,
  })
  .strict();

export type DenseScoring = z.infer<typeof DenseScoringSchema>;

/**
 * Quality-weight coefficients:
 * q = clip(1 − a·RMS/τ_RMS − b·|ΔFWHM|/τ_FWHM − c·τ_SNR/SNR, floor, ceiling)
 */
export const QualityCoefficientsSchema = z
  .object({
    a: z.number().min(0),
    b: z.number().min(0),
    c: z.number().min(0),
    tauRms: z.number().positive(),
    tauFwhm: z.number().positive(),
    tauSnr: z.number().positive(),
  })
  .strict();

export type QualityCoefficients = z.infer<typeof QualityCoefficientsSchema>;

/**
 * Everything the engine needs to score and fuse one modality.
 */
export const ModalityRubricSchema = z
  .object({
    mode: ScoringMode,
    fusionWeight: z.number().min(0).describe("λ_k in the log-posterior sum"),
    quality: QualityCoefficientsSchema,
    sparse: SparseScoringSchema.optional(),
    dense: DenseScoringSchema.optional(),
  })
  .strict()
  .superRefine((modality, ctx) => {
    if (modality.mode === "sparse" && modality.sparse === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'mode "sparse" requires a sparse section',
        path: ["sparse"],
      });
    }
    if (modality.mode === "dense" && modality.dense === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'mode "dense" requires a dense section',
        path: ["dense"],
      });
    }
  });

export type ModalityRubric = z.infer<typeof ModalityRubricSchema>;

/**
 * Per-modality rubric sections. A modality absent here is never scored.
 */
export const ModalityRubricsSchema = z
  .object({
    atomic_emission: ModalityRubricSchema.optional(),
    atomic_absorption: ModalityRubricSchema.optional(),
    infrared: ModalityRubricSchema.optional(),
    raman: ModalityRubricSchema.optional(),
    uv_vis: ModalityRubricSchema.optional(),
    fluorescence: ModalityRubricSchema.optional(),
  })
  .strict()
  .refine((sections) => Object.values(sections).some((s) => s !== undefined), {
    message: "At least one modality must be configured",
  });

export type ModalityRubrics = z.infer<typeof ModalityRubricsSchema>;

export const TierThresholdsSchema = z
  .object({
    thetaA: unitInterval.describe("Minimum G(M₁) for tier A"),
    deltaA: unitInterval.describe("Minimum gap G(M₁) − G(M₂) for tier A"),
    sMin: unitInterval.describe("Per-modality score counted as corroborating"),
    thetaB: unitInterval.describe("Minimum G(M₁) for tier B"),
    deltaB: unitInterval.describe("Minimum gap for tier B"),
    sStrong: unitInterval.describe("Single-modality score strong enough for tier B"),
    singleModalityMinMatches: z
      .number()
      .int()
      .min(1)
      .describe("Matched features required for tier A when only one modality was observed"),
  })
  .strict();

export type TierThresholds = z.infer<typeof TierThresholdsSchema>;

/**
 * Global clip bounds of every quality weight.
 */
export const QualityBoundsSchema = z
  .object({
    floor: z.number().min(0.3).max(1),
    ceiling: z.number().min(0.3).max(1),
  })
  .strict()
  .refine((q) => q.floor <= q.ceiling, {
    message: "Quality floor must not exceed the ceiling",
    path: ["floor"],
  });

export type QualityBounds = z.infer<typeof QualityBoundsSchema>;

export const FusionSettingsSchema = z
  .object({
    defaultLogPrior: z
      .number()
      .finite()
      .max(0)
      .describe("Log prior used for candidates without a supplied prior"),
    parsimonyPerComponent: z
      .number()
      .min(0)
      .describe("Γ per component beyond the first"),
    maxAlternatives: z.number().int().min(0),
    tieTolerance: z
      .number()
      .min(0)
      .describe("Log-posterior distance from a tie group's leader treated as a tie (0 = exact equality)"),
  })
  .strict();

export type FusionSettings = z.infer<typeof FusionSettingsSchema>;

export const NumericsSchema = z
  .object({
    zeroNormTolerance: z.number().positive(),
    minDenominator: z.number().positive(),
  })
  .strict();

export type Numerics = z.infer<typeof NumericsSchema>;

/**
 * Complete rubric document.
 */
export const RubricSchema = z
  .object({
    rubricVersion: z
      .string()
      .regex(/^\d+\.\d+\.\d+$/, "Rubric version must be semantic (major.minor.patch)"),
    name: z.string().min(1),
    link: z
      .object({
        epsilon: z
          .number()
          .positive()
          .lt(0.5)
          .describe("ε in f(S) = log((ε+S)/(ε+1−S))"),
      })
      .strict(),
    modalities: ModalityRubricsSchema,
    quality: QualityBoundsSchema,
    fusion: FusionSettingsSchema,
    tiers: TierThresholdsSchema,
    features: z
      .object({
        excludeFlags: z
          .array(QualityFlag)
          .describe("Features carrying any of these flags are rejected from scoring"),
      })
      .strict(),
    numerics: NumericsSchema,
  })
  .strict();

export type Rubric = z.infer<typeof RubricSchema>;
export type RubricInput = z.input<typeof RubricSchema>;
