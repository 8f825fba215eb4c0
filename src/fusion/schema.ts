/**
 * Fusion, ranking and tier records embedded in each hypothesis.
 */

import { z } from "zod";
import { ConfidenceTier, Modality } from "../config/rubric/enums.js";

/**
 * One modality's term of the log-posterior sum.
 */
/**
 * "no_template": the candidate has no template in a modality scored for
 * another candidate of the run, and the term is fused as S = 0.
 */
export const ContributionBasis = z.enum(["scored", "no_template"]);
export type ContributionBasis = z.infer<typeof ContributionBasis>;

export const ModalityContributionSchema = z
  .object({
    modality: Modality,
    basis: ContributionBasis,
    score: z.number().min(0).max(1),
    qualityWeight: z.number().min(0).max(1),
    fusionWeight: z.number().min(0),
    /** f(S) = log((ε+S)/(ε+1−S)) */
    link: z.number(),
    /** λ·q·f(S) */
    contribution: z.number(),
  })
  .strict();

export type ModalityContribution = z.infer<typeof ModalityContributionSchema>;

export const PosteriorSchema = z
  .object({
    logPrior: z.number(),
    priorSource: z.enum(["supplied", "rubric_default"]),
    evidence: z.number(),
    parsimonyPenalty: z.number().min(0),
    logPosterior: z.number(),
    /** G = σ(log P) */
    score: z.number().min(0).max(1),
    contributions: z.array(ModalityContributionSchema),
  })
  .strict();

export type Posterior = z.infer<typeof PosteriorSchema>;

export const SingleModalityExceptionSchema = z
  .object({
    applied: z.boolean(),
    modality: Modality.nullable(),
    matched: z.number().int().min(0),
    required: z.number().int().min(0),
    satisfied: z.boolean(),
  })
  .strict();

export type SingleModalityException = z.infer<typeof SingleModalityExceptionSchema>;

export const TierAssessmentSchema = z
  .object({
    tier: ConfidenceTier,
    /** G of this hypothesis minus G of the best other hypothesis (G itself when alone). */
    delta: z.number(),
    corroboratingModalities: z.array(Modality),
    rationale: z.array(z.string()),
    singleModality: SingleModalityExceptionSchema,
  })
  .strict();

export type TierAssessment = z.infer<typeof TierAssessmentSchema>;

export const FollowupSchema = z.discriminatedUnion("kind", [
  z
    .object({
      kind: z.literal("expected_feature"),
      candidateId: z.string(),
      modality: Modality,
      templateSourceId: z.string(),
      expectedCenter: z.number(),
      label: z.string().optional(),
      nearestLikelihood: z.number().min(0).max(1),
      rationale: z.string(),
    })
    .strict(),
  z
    .object({
      kind: z.literal("acquire_modality"),
      candidateId: z.string(),
      modality: Modality,
      rationale: z.string(),
    })
    .strict(),
]);

export type Followup = z.infer<typeof FollowupSchema>;

export const AlternativeSchema = z
  .object({
    candidateId: z.string(),
    label: z.string(),
    rank: z.number().int().min(1),
    score: z.number().min(0).max(1),
    /** G of this hypothesis minus G of the alternative. */
    scoreGap: z.number(),
    logPosteriorGap: z.number(),
  })
  .strict();

export type Alternative = z.infer<typeof AlternativeSchema>;
