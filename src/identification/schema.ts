/**
 * Identification document schema.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * THE DOCUMENT IS DETERMINISTIC
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Everything here is a function of the inputs, the rubric and the seed.
 * Wall-clock time, host names, run ids and the worker pool size live in the
 * separate provenance manifest, never in this document, so two runs over the
 * same inputs serialize to identical bytes.
 *
 * The zod schemas are the definition of the types: an identification result
 * is exactly what deserialization produces.
 */

import { z } from "zod";
import { CandidateExclusionSchema } from "../candidates/schema.js";
import { EvidenceGraphSchema } from "../evidence/schema.js";
import { PriorParameterSchema } from "../fusion/priors.js";
import {
  AlternativeSchema,
  FollowupSchema,
  PosteriorSchema,
  TierAssessmentSchema,
} from "../fusion/schema.js";
import { ModalityScoreSchema } from "../scoring/schema.js";
import { RunWarningSchema } from "../shared/warnings.js";
import { SourceIdSchema } from "../templates/schema.js";

/**
 * Current document format version.
 * Major bumps are incompatible; deserialization rejects them.
 */
export const DOCUMENT_VERSION = "1.0.0";

export const ReasonCode = z.enum(["ok", "no_candidates_available"]);
export type ReasonCode = z.infer<typeof ReasonCode>;

export const RunSeedSchema = z.union([z.string().min(1), z.number().int().finite()]);
export type RunSeed = z.infer<typeof RunSeedSchema>;

export const HypothesisSchema = z
  .object({
    candidateId: z.string(),
    label: z.string(),
    components: z.array(z.string()),
    rank: z.number().int().min(1),
    priorParameters: z.array(PriorParameterSchema),
    /** Per-modality scores, canonical modality order. */
    modalityScores: z.array(ModalityScoreSchema),
    posterior: PosteriorSchema,
    tier: TierAssessmentSchema,
    alternatives: z.array(AlternativeSchema),
    requiredFollowups: z.array(FollowupSchema),
    warnings: z.array(RunWarningSchema),
    evidence: EvidenceGraphSchema,
  })
  .strict();

export type Hypothesis = z.infer<typeof HypothesisSchema>;

export const RubricReferenceSchema = z
  .object({
    name: z.string(),
    version: z.string(),
    /** sha256 of the canonical JSON of the validated rubric */
    digest: z.string().regex(/^[0-9a-f]{64}$/),
  })
  .strict();

export type RubricReference = z.infer<typeof RubricReferenceSchema>;

export const IdentificationDocumentSchema = z
  .object({
    documentVersion: z.string().regex(/^\d+\.\d+\.\d+$/),
    sessionId: z.string(),
    datasetId: z.string(),
    rubric: RubricReferenceSchema,
    /** Sorted "source_id@version" of every template the ranked candidates used. */
    templateVersions: z.array(SourceIdSchema),
    seed: RunSeedSchema,
    reasonCode: ReasonCode,
    candidates: z
      .object({
        considered: z.number().int().min(0),
        excluded: z.array(CandidateExclusionSchema),
      })
      .strict(),
    warnings: z.array(RunWarningSchema),
    hypotheses: z.array(HypothesisSchema),
  })
  .strict();

export type IdentificationDocument = z.infer<typeof IdentificationDocumentSchema>;

/** What identify() resolves to: the frozen document. */
export type IdentificationResult = Readonly<IdentificationDocument>;
