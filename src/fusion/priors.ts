/**
 * Candidate priors.
 *
 * A prior is a log-probability plus optional context parameters (estimated
 * temperature, matrix, pressure, ...) that are recorded as conditions in
 * the evidence graph. Candidates without a valid prior fall back to the
 * rubric's default log prior.
 */

import { z } from "zod";
import type { Rubric } from "../config/rubric/schema.js";
import { compareWarnings, type RunWarning } from "../shared/warnings.js";
import { formatFieldPath, toFieldIssues } from "../shared/zod-issues.js";
import type { Posterior } from "./schema.js";

export const PriorParameterSchema = z
  .object({
    name: z.string().min(1),
    value: z.union([z.number().finite(), z.string(), z.boolean()]),
    unit: z.string().min(1).optional(),
    weight: z.number().finite().min(0).optional(),
  })
  .strict();

export const PriorSchema = z
  .object({
    candidateId: z.string().min(1),
    logPrior: z.number().finite().max(0, "A log prior cannot exceed 0"),
    parameters: z.array(PriorParameterSchema).default([]),
  })
  .strict();

export type PriorParameter = z.infer<typeof PriorParameterSchema>;
export type Prior = z.infer<typeof PriorSchema>;
export type PriorInput = z.input<typeof PriorSchema>;

export interface ResolvedPrior {
  logPrior: number;
  source: Posterior["priorSource"];
  parameters: readonly PriorParameter[];
}

export interface PriorTable {
  resolve(candidateId: string): ResolvedPrior;
  warnings: RunWarning[];
}

/**
 * Validate raw priors against the candidates being scored.
 * Invalid entries and priors for unknown candidates become warnings.
 */
export function resolvePriors(
  input: readonly unknown[],
  candidateIds: ReadonlySet<string>,
  rubric: Pick<Rubric, "fusion">
): PriorTable {
  const warnings: RunWarning[] = [];
  const priors = new Map<string, Prior>();

  input.forEach((raw, index) => {
    const parsed = PriorSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = toFieldIssues(parsed.error.issues)[0];
      warnings.push({
        code: "prior_rejected",
        message: `Prior at index ${index} rejected: ${formatFieldPath(issue?.path ?? [])}: ${issue?.message ?? "invalid"}; rubric default used`,
      });
      return;
    }
    const prior = parsed.data;
    if (!candidateIds.has(prior.candidateId)) {
      warnings.push({
        code: "prior_unknown_candidate",
        message: `Prior for "${prior.candidateId}" ignored: candidate is not being scored`,
        candidateId: prior.candidateId,
      });
      return;
    }
    if (priors.has(prior.candidateId)) {
      warnings.push({
        code: "prior_rejected",
        message: `Duplicate prior for "${prior.candidateId}" at index ${index}; first occurrence kept`,
        candidateId: prior.candidateId,
      });
      return;
    }
    priors.set(prior.candidateId, prior);
  });

  return {
    resolve(candidateId: string): ResolvedPrior {
      const prior = priors.get(candidateId);
      return prior
        ? { logPrior: prior.logPrior, source: "supplied", parameters: prior.parameters }
        : { logPrior: rubric.fusion.defaultLogPrior, source: "rubric_default", parameters: [] };
    },
    warnings: warnings.sort(compareWarnings),
  };
}
