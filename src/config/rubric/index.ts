/**
 * Rubric configuration module.
 *
 * Provides the schema-validated, immutable weight/threshold document that
 * governs scoring and fusion.
 *
 * Usage:
 *   import { loadRubric, DEFAULT_RUBRIC } from "./config/rubric/index.js";
 *
 *   const rubric = loadRubric(DEFAULT_RUBRIC);
 *
 *   const stricter = loadRubric({
 *     ...DEFAULT_RUBRIC,
 *     tiers: { ...DEFAULT_RUBRIC.tiers, thetaA: 0.9 },
 *   });
 */

export {
  Modality,
  MODALITY_ORDER,
  compareModalities,
  ScoringMode,
  ShapeFamily,
  QualityFlag,
  IntensityMethod,
  PositionTransform,
  FalsePositiveScope,
  ConfidenceTier,
} from "./enums.js";

export type {
  Rubric,
  RubricInput,
  ModalityRubric,
  ModalityRubrics,
  SparseScoring,
  DenseScoring,
  IntensityScoring,
  ComponentWeights,
  GridAxis,
  CorrelationTransform,
  QualityCoefficients,
  TierThresholds,
  QualityBounds,
  FusionSettings,
  Numerics,
} from "./schema.js";

export {
  RubricSchema,
  ModalityRubricSchema,
  ComponentWeightsSchema,
  CorrelationTransformSchema,
  WEIGHT_SUM_TOLERANCE,
} from "./schema.js";

export { loadRubric, validateRubric, loadRubricFromFile, RubricConfigError } from "./loader.js";

export { DEFAULT_RUBRIC } from "./defaults.js";
