/**
 * Recoverable conditions reported alongside results.
 *
 * Input problems and numerical degeneracies never abort a run; they surface
 * here instead, naming the feature, spectrum, modality or candidate involved.
 */

import { z } from "zod";
import { Modality } from "../config/rubric/enums.js";

export const WarningCode = z.enum([
  "feature_rejected",
  "feature_excluded_flag",
  "feature_duplicate",
  "feature_unknown_spectrum",
  "spectrum_rejected",
  "spectrum_duplicate",
  "template_rejected",
  "template_duplicate",
  "template_mode_mismatch",
  "template_unscored_modality",
  "template_unknown_candidate",
  "catalog_entry_rejected",
  "catalog_duplicate",
  "constraint_unknown_candidate",
  "prior_rejected",
  "prior_unknown_candidate",
  "qc_metric_missing",
  "qc_spectrum_missing",
  "qc_degraded",
  "dense_multiple_spectra",
  "score_degraded",
]);
export type WarningCode = z.infer<typeof WarningCode>;

export const RunWarningSchema = z
  .object({
    code: WarningCode,
    message: z.string(),
    modality: Modality.optional(),
    candidateId: z.string().optional(),
    featureId: z.string().optional(),
    spectrumId: z.string().optional(),
  })
  .strict();

export type RunWarning = z.infer<typeof RunWarningSchema>;

/**
 * Deterministic ordering for warning lists: code, modality, candidate,
 * feature, spectrum, then message.
 */
export function compareWarnings(a: RunWarning, b: RunWarning): number {
  const keys: Array<keyof RunWarning> = [
    "code",
    "modality",
    "candidateId",
    "featureId",
    "spectrumId",
    "message",
  ];
  for (const key of keys) {
    const left = a[key] ?? "";
    const right = b[key] ?? "";
    if (left < right) return -1;
    if (left > right) return 1;
  }
  return 0;
}
