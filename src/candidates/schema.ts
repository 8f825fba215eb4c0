/**
 * Candidate catalog, detection gate and user constraint schemas.
 */

import { z } from "zod";

/**
 * Element symbol, e.g. "Fe" or "Na".
 */
export const ElementSymbol = z
  .string()
  .regex(/^[A-Z][a-z]{0,2}$/, 'Element symbols look like "Fe" or "Na"');

export const Phase = z.enum(["solid", "liquid", "gas", "plasma", "solution"]);
export type Phase = z.infer<typeof Phase>;

/**
 * Environment a candidate can exist in. An omitted field places no
 * constraint on that aspect.
 */
export const EnvironmentConstraintsSchema = z
  .object({
    phases: z.array(Phase).min(1).optional(),
    temperatureRange: z
      .object({
        min: z.number().finite().min(0).describe("Kelvin"),
        max: z.number().finite().min(0).describe("Kelvin"),
      })
      .strict()
      .refine((range) => range.max >= range.min, {
        message: "Temperature range max must be greater than or equal to min",
        path: ["max"],
      })
      .optional(),
    solvents: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

export type EnvironmentConstraints = z.infer<typeof EnvironmentConstraintsSchema>;

/**
 * One catalog entry: a species, compound or mixture that may be identified.
 */
export const CandidateEntrySchema = z
  .object({
    id: z.string().min(1),
    label: z.string().min(1),
    /** Constituent components; more than one incurs the parsimony penalty. */
    components: z.array(z.string().min(1)).min(1),
    requiredElements: z.array(ElementSymbol).default([]),
    forbiddenElements: z.array(ElementSymbol).default([]),
    environment: EnvironmentConstraintsSchema.default({}),
    tags: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type CandidateEntry = z.infer<typeof CandidateEntrySchema>;
export type CandidateEntryInput = z.input<typeof CandidateEntrySchema>;

/**
 * Detection gates established before identification.
 *
 * detectedElements is undefined when no elemental screening was performed;
 * element rules then pass every candidate. The same holds for each
 * environment field.
 */
export const DetectionGatesSchema = z
  .object({
    detectedElements: z.array(ElementSymbol).optional(),
    absentElements: z.array(ElementSymbol).default([]),
    environment: z
      .object({
        phase: Phase.optional(),
        temperature: z.number().finite().min(0).optional(),
        solvent: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

export type DetectionGates = z.infer<typeof DetectionGatesSchema>;
export type DetectionGatesInput = z.input<typeof DetectionGatesSchema>;

/**
 * User overrides applied after the rules. Both lists always win over the
 * gates; the blacklist wins over the whitelist.
 */
export const UserConstraintsSchema = z
  .object({
    whitelist: z.array(z.string().min(1)).default([]),
    blacklist: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type UserConstraints = z.infer<typeof UserConstraintsSchema>;
export type UserConstraintsInput = z.input<typeof UserConstraintsSchema>;

/**
 * Why a catalog entry did not become a hypothesis.
 */
export const CandidateExclusionSchema = z
  .object({
    candidateId: z.string(),
    ruleId: z.string(),
    message: z.string(),
  })
  .strict();

export type CandidateExclusion = z.infer<typeof CandidateExclusionSchema>;
