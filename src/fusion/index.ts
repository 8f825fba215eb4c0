/**
 * Fusion module: posterior aggregation, ranking, tiers and follow-ups.
 */

export {
  ContributionBasis,
  ModalityContributionSchema,
  PosteriorSchema,
  SingleModalityExceptionSchema,
  TierAssessmentSchema,
  FollowupSchema,
  AlternativeSchema,
  type ModalityContribution,
  type Posterior,
  type SingleModalityException,
  type TierAssessment,
  type Followup,
  type Alternative,
} from "./schema.js";

export {
  fuse,
  linkFunction,
  parsimonyPenalty,
  posteriorScore,
  type FusionInput,
  type FusionTerm,
} from "./posterior.js";

export {
  rankHypotheses,
  breakTie,
  tieGroups,
  corroboratingCount,
  minimumScore,
  type RankingKey,
} from "./ranking.js";

export { assignTier, type TierInput, type TierModalityInput } from "./tiers.js";

export { recommendFollowup, type FollowupCandidate } from "./followups.js";

export {
  PriorSchema,
  PriorParameterSchema,
  resolvePriors,
  type Prior,
  type PriorInput,
  type PriorParameter,
  type PriorTable,
  type ResolvedPrior,
} from "./priors.js";
