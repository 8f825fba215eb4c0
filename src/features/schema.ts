/**
 * Feature and spectrum metadata schemas.
 *
 * Features arrive from the extraction subsystem already on the canonical
 * axis of their modality. Each one is validated on its own: a feature with
 * missing metadata is rejected from scoring without rejecting its
 * neighbours.
 */

import { z } from "zod";
import { Modality, ShapeFamily, QualityFlag } from "../config/rubric/enums.js";

const finite = z.number().finite();

/**
 * Observed intensity with its unit tag.
 * The unit tag is mandatory: intensities without one cannot be compared.
 */
export const IntensitySchema = z
  .object({
    value: finite,
    unit: z.string().min(1, "Intensity unit tag is required"),
    uncertainty: finite.min(0),
  })
  .strict();

export type Intensity = z.infer<typeof IntensitySchema>;

/**
 * Back-reference to the extraction algorithm and the parameters it ran with.
 */
export const ExtractionProvenanceSchema = z
  .object({
    algorithm: z.string().min(1),
    parameters: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
  })
  .strict();

export type ExtractionProvenance = z.infer<typeof ExtractionProvenanceSchema>;

/**
 * One observed spectral event (peak, band or edge).
 */
export const FeatureSchema = z
  .object({
    id: z.string().min(1),
    modality: Modality,
    spectrumId: z.string().min(1),
    center: finite,
    centerUncertainty: finite.positive("Center uncertainty must be positive"),
    fwhm: finite.min(0),
    fwhmUncertainty: finite.min(0),
    intensity: IntensitySchema,
    shape: ShapeFamily.default("unknown"),
    annotations: z.array(z.string()).default([]),
    extraction: ExtractionProvenanceSchema,
    flags: z.array(QualityFlag).default([]),
  })
  .strict();

export type Feature = z.infer<typeof FeatureSchema>;
export type FeatureInput = z.input<typeof FeatureSchema>;

/**
 * QC metrics supplied by the calibration subsystem.
 * Any metric may be absent; the quality weighter reports what it lacked.
 */
export const QcMetricsSchema = z
  .object({
    calibrationRms: finite.min(0).optional(),
    fwhmDeviation: finite.optional(),
    snr: finite.optional(),
  })
  .strict();

export type QcMetrics = z.infer<typeof QcMetricsSchema>;

/**
 * A sampled observed segment for dense-mode scoring.
 */
export const SampledSegmentSchema = z
  .object({
    x: z.array(finite).min(2),
    y: z.array(finite).min(2),
  })
  .strict()
  .superRefine((segment, ctx) => {
    if (segment.x.length !== segment.y.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `x and y must have equal length (got ${segment.x.length} and ${segment.y.length})`,
        path: ["y"],
      });
      return;
    }
    for (let i = 1; i < segment.x.length; i++) {
      const prev = segment.x[i - 1];
      const next = segment.x[i];
      if (prev !== undefined && next !== undefined && next <= prev) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `x must be strictly ascending (index ${i})`,
          path: ["x", i],
        });
        return;
      }
    }
  });

export type SampledSegment = z.infer<typeof SampledSegmentSchema>;

/**
 * Metadata of an originating spectrum.
 */
export const SpectrumMetadataSchema = z
  .object({
    id: z.string().min(1),
    modality: Modality,
    qc: QcMetricsSchema.default({}),
    lineSpreadFwhm: finite.positive().optional(),
    intensityCalibration: z.enum(["reliable", "unreliable"]).default("reliable"),
    samples: SampledSegmentSchema.optional(),
  })
  .strict();

export type SpectrumMetadata = z.infer<typeof SpectrumMetadataSchema>;
export type SpectrumMetadataInput = z.input<typeof SpectrumMetadataSchema>;

/**
 * Raw observations as handed over by the extraction subsystem.
 * Entries stay unknown until the store validates them one by one.
 */
export interface ObservationBundle {
  features: readonly unknown[];
  spectra: readonly unknown[];
}
