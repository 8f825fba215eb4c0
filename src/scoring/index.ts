/**
 * Scoring module: per-modality scorers and the quality weighter.
 */

export {
  ModalityStatus,
  IntensityStatus,
  LineMatchSchema,
  UnmatchedLineSchema,
  SparseComponentsSchema,
  SparseModalityScoreSchema,
  DenseModalityScoreSchema,
  ModalityScoreSchema,
  QualityAssessmentSchema,
  type LineMatch,
  type UnmatchedLine,
  type SparseComponents,
  type SparseModalityScore,
  type DenseModalityScore,
  type ModalityScore,
  type QualityAssessment,
} from "./schema.js";

export {
  scoreSparse,
  combinedSigma,
  comparePairs,
  type CandidatePair,
  type SparseScoringInput,
} from "./sparse.js";
export { scoreDense, convolveTemplate, type DenseScoringInput } from "./dense.js";
export { assessQuality, type QualityInput } from "./quality.js";
export {
  CORRELATION_TRANSFORMS,
  applyCorrelationTransform,
  transformCorrelation,
  type TransformedCorrelation,
  type CorrelationTransformFn,
  type CorrelationTransformRegistry,
} from "./transforms.js";
export { FWHM_TO_SIGMA, fwhmToSigma, logistic, clampUnit } from "./numeric.js";
