/**
 * Reference template schemas.
 *
 * A template is the expectation set of one candidate in one modality,
 * pinned to a versioned reference source ("source_id@version"). Templates
 * are read-only inputs supplied per run; their curation is not this
 * engine's concern.
 */

import { z } from "zod";
import { Modality } from "../config/rubric/enums.js";
import { SampledSegmentSchema } from "../features/schema.js";

/**
 * Version-pinned reference identifier, e.g. "nist-asd@5.11".
 */
export const SourceIdSchema = z
  .string()
  .regex(/^[^@\s]+@[^@\s]+$/, 'Source id must have the form "source_id@version"');

/**
 * One expected line/band of a sparse template.
 */
export const ExpectedLineSchema = z
  .object({
    center: z.number().finite(),
    /** σ_lib: library uncertainty of the center */
    sigma: z.number().finite().positive(),
    /** Expected intensity relative to the template's other lines */
    relativeIntensity: z.number().finite().min(0).optional(),
    label: z.string().optional(),
  })
  .strict();

export type ExpectedLine = z.infer<typeof ExpectedLineSchema>;

export const SparseTemplateSchema = z
  .object({
    kind: z.literal("sparse"),
    candidateId: z.string().min(1),
    modality: Modality,
    sourceId: SourceIdSchema,
    lines: z.array(ExpectedLineSchema).min(1),
  })
  .strict();

export type SparseTemplate = z.infer<typeof SparseTemplateSchema>;

export const DenseTemplateSchema = z
  .object({
    kind: z.literal("dense"),
    candidateId: z.string().min(1),
    modality: Modality,
    sourceId: SourceIdSchema,
    samples: SampledSegmentSchema,
  })
  .strict();

export type DenseTemplate = z.infer<typeof DenseTemplateSchema>;

export const TemplateSchema = z.discriminatedUnion("kind", [
  SparseTemplateSchema,
  DenseTemplateSchema,
]);

export type Template = z.infer<typeof TemplateSchema>;
export type TemplateInput = z.input<typeof TemplateSchema>;
